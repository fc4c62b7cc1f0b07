import { AIMessage, HumanMessage } from '@langchain/core/messages';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import type { ChatMessage, StreamRecord } from '@datachat/shared-types';
import type { CompletionRequest, CompletionService } from '../contracts';
import { describeError, makeChatServiceError, mapHttpStatusToError } from '../http/errors';
import type { ScriptedScenario } from './scenario';

function toLcMessage(message: ChatMessage): HumanMessage | AIMessage {
  if (message.role === 'assistant') {
    return new AIMessage(message.content);
  }
  return new HumanMessage(message.content);
}

function extractText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part) => (part && typeof part === 'object' && 'text' in part && typeof part.text === 'string' ? part.text : ''))
      .join('');
  }
  return '';
}

function encodeRecord(encoder: TextEncoder, record: StreamRecord): Uint8Array {
  return encoder.encode(`data: ${JSON.stringify(record)}\n\n`);
}

function throwTransportFailure(scenario: ScriptedScenario): void {
  if (scenario.failure?.kind === 'network') {
    throw makeChatServiceError('Network request failed: scripted network error', 'network', true);
  }
  if (scenario.failure?.kind === 'http') {
    throw mapHttpStatusToError(scenario.failure.status, 'scripted upstream error');
  }
}

function createModel(scenario: ScriptedScenario): FakeListChatModel {
  return new FakeListChatModel({ responses: [scenario.response], sleep: scenario.chunkDelayMs });
}

async function* streamCharacters(scenario: ScriptedScenario, request: CompletionRequest): AsyncGenerator<string> {
  if (!scenario.response) {
    return;
  }
  const model = createModel(scenario);
  const chunks = await model.stream(request.messages.map(toLcMessage));
  for await (const chunk of chunks) {
    for (const character of Array.from(extractText(chunk.content))) {
      yield character;
    }
  }
}

function buildRecordStream(scenario: ScriptedScenario, request: CompletionRequest): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const source = streamCharacters(scenario, request);
  const charsPerRecord = Math.max(1, scenario.charsPerRecord ?? 4);
  const failure = scenario.failure?.kind === 'server' ? scenario.failure : undefined;
  let emitted = 0;
  let pending = '';
  let finished = false;

  const closeSource = async (): Promise<void> => {
    try {
      await source.return(undefined);
    } catch (error) {
      console.debug('[datachat][scripted] closing scenario source failed', describeError(error));
    }
  };

  const limitReached = (): boolean => {
    if (failure && emitted >= (failure.afterChars ?? 0)) return true;
    return scenario.stopAfterChars !== undefined && emitted >= scenario.stopAfterChars;
  };

  return new ReadableStream<Uint8Array>({
    start(controller) {
      request.signal?.addEventListener(
        'abort',
        () => {
          if (finished) return;
          finished = true;
          controller.error(new DOMException('The operation was aborted.', 'AbortError'));
          void closeSource();
        },
        { once: true },
      );
    },
    async pull(controller) {
      while (!finished) {
        if (limitReached()) {
          if (pending) {
            controller.enqueue(encodeRecord(encoder, { content: pending }));
            pending = '';
          }
          controller.enqueue(
            encodeRecord(encoder, failure ? { error: failure.message } : { content: '', stopped: true }),
          );
          finished = true;
          controller.close();
          await closeSource();
          return;
        }

        const next = await source.next();
        if (finished) {
          return;
        }
        if (next.done) {
          if (pending) {
            controller.enqueue(encodeRecord(encoder, { content: pending }));
          }
          finished = true;
          controller.close();
          return;
        }

        pending += next.value;
        emitted += 1;
        if (Array.from(pending).length >= charsPerRecord) {
          controller.enqueue(encodeRecord(encoder, { content: pending }));
          pending = '';
          return;
        }
      }
    },
    async cancel() {
      finished = true;
      await closeSource();
    },
  });
}

export function createScriptedCompletionService(scenario: ScriptedScenario): CompletionService {
  return {
    async openStream(request) {
      console.info('[datachat][scripted] stream request', { scenario: scenario.name, turnId: request.turnId });
      throwTransportFailure(scenario);
      return buildRecordStream(scenario, request);
    },
    async completeOnce(request) {
      console.info('[datachat][scripted] single-shot request', { scenario: scenario.name, turnId: request.turnId });
      throwTransportFailure(scenario);
      if (scenario.failure?.kind === 'server') {
        throw makeChatServiceError(scenario.failure.message, 'server', false);
      }
      if (!scenario.response) {
        return '';
      }
      const output = await createModel({ ...scenario, chunkDelayMs: undefined }).invoke(request.messages.map(toLcMessage));
      return extractText(output.content);
    },
    async notifyStop(turnId) {
      return { success: true, message: `Request ${turnId} stopped` };
    },
  };
}
