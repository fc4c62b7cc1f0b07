import type {
  ActionMode,
  AnswerSource,
  ChatMessage,
  SessionEvent,
  TerminalTurnStatus,
  TurnStatus,
  TurnSummary,
} from '@datachat/shared-types';
import { previewText } from '@datachat/storage-local';
import type { CompletionRequest, CompletionService } from '../llm/contracts';
import { createHttpCompletionService } from '../llm/http/adapter';
import { describeError, isCancelledReadError, isChatServiceError, makeChatServiceError } from '../llm/http/errors';
import { parseChatEventStream } from '../llm/http/stream';
import { abortTurnIo, requestServerStop, shouldNotifyService, type CancelReason } from './cancellation';
import { DEFAULT_PREDEFINED_ANSWERS, findPredefinedAnswer } from './predefined-answers';
import {
  advanceTurn,
  appendContent,
  assignSource,
  createTurnId as createDefaultTurnId,
  openTurn,
  type TurnContext,
} from './turn-context';
import type { ChatSession, ChatSessionConfig, TurnOutcome } from './types';
import { sliceForTyping, wait } from './typing';

export const NO_RESPONSE_NOTICE = 'No response received. Please try again.';

type TurnClosure =
  | { status: 'completed'; source: AnswerSource }
  | { status: 'cancelled'; reason: CancelReason }
  | { status: 'failed'; reason: string };

export function createChatSession(config: ChatSessionConfig): ChatSession {
  const listeners = new Set<(event: SessionEvent) => void>();
  const now = config.now ?? Date.now;
  const nextTurnId = config.createTurnId ?? (() => createDefaultTurnId(now));
  const settings = config.settings;
  const predefinedAnswers = config.predefinedAnswers ?? DEFAULT_PREDEFINED_ANSWERS;
  const service: CompletionService =
    config.completionService ?? createHttpCompletionService({ settings, fetch: config.fetch });

  let history: ChatMessage[] = [];
  let active: TurnContext | null = null;
  let actionMode: ActionMode = 'send';
  const settled = new Map<string, TurnOutcome>();

  const emit = (event: SessionEvent): void => {
    for (const listener of listeners) {
      listener(event);
    }
  };

  const isCurrent = (turnId: string): boolean => active?.turnId === turnId;

  function currentContext(turnId: string): TurnContext | null {
    return active && active.turnId === turnId ? active : null;
  }

  function setActionMode(mode: ActionMode): void {
    if (actionMode === mode) {
      return;
    }
    actionMode = mode;
    emit({ type: 'action.mode.changed', payload: { mode } });
  }

  function appendHistory(message: ChatMessage): void {
    history = [...history, message];
    emit({ type: 'history.changed', payload: { messages: history } });
  }

  function transition(turnId: string, status: TurnStatus): TurnContext | null {
    const context = currentContext(turnId);
    if (!context) {
      return null;
    }
    const next = advanceTurn(context, status);
    active = next;
    emit({ type: 'turn.status.changed', payload: { turnId, status, previous: context.status } });
    return next;
  }

  function summarize(context: TurnContext, status: TerminalTurnStatus): TurnSummary {
    const endedAt = now();
    return {
      turnId: context.turnId,
      status,
      timing: { startedAt: context.startedAt, endedAt, durationMs: endedAt - context.startedAt },
    };
  }

  function closeTurn(turnId: string, closure: TurnClosure): boolean {
    const context = transition(turnId, closure.status);
    if (!context) {
      return false;
    }
    active = null;
    settled.set(turnId, { turnId, status: closure.status, content: context.buffer });
    const summary = summarize(context, closure.status);

    if (closure.status === 'completed') {
      if (context.buffer) {
        appendHistory({ role: 'assistant', content: context.buffer });
        emit({ type: 'turn.completed', payload: { ...summary, content: context.buffer, source: closure.source } });
      } else {
        console.warn('[datachat][session] turn completed without content', { turnId });
        emit({ type: 'turn.empty', payload: { ...summary, notice: NO_RESPONSE_NOTICE } });
      }
    } else if (closure.status === 'cancelled') {
      console.info('[datachat][session] turn cancelled', { turnId, reason: closure.reason });
      emit({ type: 'turn.cancelled', payload: { ...summary, partialContent: context.buffer } });
    } else {
      console.error('[datachat][session] turn failed', { turnId, reason: closure.reason });
      emit({ type: 'turn.failed', payload: { ...summary, reason: closure.reason } });
    }

    setActionMode('send');
    emit({ type: 'composer.focus', payload: { turnId } });
    return true;
  }

  function cancelActive(reason: CancelReason): boolean {
    const context = active;
    if (!context) {
      return false;
    }
    abortTurnIo(context);
    closeTurn(context.turnId, { status: 'cancelled', reason });
    if (shouldNotifyService(context)) {
      requestServerStop(service, context.turnId);
    }
    return true;
  }

  function markSource(turnId: string, source: AnswerSource): void {
    const context = currentContext(turnId);
    if (context) {
      active = assignSource(context, source);
    }
  }

  function appendDelta(turnId: string, delta: string): boolean {
    const context = currentContext(turnId);
    if (!context) {
      return false;
    }
    const next = appendContent(context, delta);
    active = next;
    emit({ type: 'turn.content.delta', payload: { turnId, delta, text: next.buffer } });
    return true;
  }

  async function render(turnId: string, final: boolean): Promise<void> {
    const context = currentContext(turnId);
    if (!context || !config.renderAnswer) {
      return;
    }
    await config.renderAnswer({ turnId, text: context.buffer, final });
  }

  function buildRequest(context: TurnContext): CompletionRequest {
    return {
      turnId: context.turnId,
      messages: history,
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
      signal: context.abortController.signal,
    };
  }

  async function finishAnswer(turnId: string, source: AnswerSource): Promise<void> {
    const context = currentContext(turnId);
    if (!context) {
      return;
    }
    if (context.buffer) {
      await render(turnId, true);
    }
    closeTurn(turnId, { status: 'completed', source });
  }

  async function discardStream(stream: ReadableStream<Uint8Array>): Promise<void> {
    try {
      await stream.cancel();
    } catch (error) {
      console.debug('[datachat][stream] discarding superseded stream failed', describeError(error));
    }
  }

  async function playPredefinedAnswer(turnId: string, answer: string): Promise<void> {
    markSource(turnId, 'predefined');
    const context = transition(turnId, 'streaming');
    if (!context) {
      return;
    }
    const signal = context.abortController.signal;

    for (const slice of sliceForTyping(answer, settings.typingSliceSize)) {
      if (!appendDelta(turnId, slice)) {
        return;
      }
      await render(turnId, false);
      await wait(settings.typingDelayMs, signal);
    }

    await finishAnswer(turnId, 'predefined');
  }

  async function runSingleShot(turnId: string): Promise<void> {
    markSource(turnId, 'single_shot');
    const context = currentContext(turnId);
    if (!context) {
      return;
    }

    const answer = await service.completeOnce(buildRequest(context));
    if (!transition(turnId, 'streaming')) {
      return;
    }
    if (answer) {
      appendDelta(turnId, answer);
    }
    await finishAnswer(turnId, 'single_shot');
  }

  async function runStream(turnId: string): Promise<void> {
    markSource(turnId, 'stream');
    const context = currentContext(turnId);
    if (!context) {
      return;
    }

    let stream: ReadableStream<Uint8Array>;
    try {
      stream = await service.openStream(buildRequest(context));
    } catch (error) {
      if (isChatServiceError(error) && error.code === 'stream_unavailable' && isCurrent(turnId)) {
        console.warn('[datachat][session] streaming unavailable, falling back to single-shot', { turnId });
        await runSingleShot(turnId);
        return;
      }
      throw error;
    }

    if (!transition(turnId, 'streaming')) {
      await discardStream(stream);
      return;
    }

    for await (const event of parseChatEventStream(stream)) {
      if (!isCurrent(turnId)) {
        console.debug('[datachat][stream] discarded event for superseded turn', { turnId, type: event.type });
        return;
      }
      if (event.type === 'error') {
        throw makeChatServiceError(event.message, 'server', false);
      }
      if (event.type === 'stopped') {
        break;
      }
      appendDelta(turnId, event.text);
      await render(turnId, false);
    }

    await finishAnswer(turnId, 'stream');
  }

  async function runTurn(turnId: string, text: string): Promise<TurnOutcome> {
    const signal = currentContext(turnId)?.abortController.signal;
    try {
      const predefined = findPredefinedAnswer(text, predefinedAnswers);
      if (predefined !== null) {
        await playPredefinedAnswer(turnId, predefined);
      } else if (settings.streamingEnabled) {
        await runStream(turnId);
      } else {
        await runSingleShot(turnId);
      }
    } catch (error) {
      // Read and abort errors count as cancellation only once this turn's I/O was aborted.
      const cancelled = signal?.aborted === true && isCancelledReadError(error);
      if (isCurrent(turnId)) {
        if (cancelled) {
          closeTurn(turnId, { status: 'cancelled', reason: 'user' });
        } else {
          closeTurn(turnId, { status: 'failed', reason: describeError(error) });
        }
      } else if (!cancelled) {
        console.debug('[datachat][session] ignored error from superseded turn', { turnId, reason: describeError(error) });
      }
    }

    if (isCurrent(turnId)) {
      // A path returned without settling; no answer can arrive any more.
      closeTurn(turnId, { status: 'failed', reason: 'Turn ended without a result' });
    }

    const outcome = settled.get(turnId) ?? { turnId, status: 'cancelled' as const, content: '' };
    settled.delete(turnId);
    return outcome;
  }

  return {
    async submit(rawText: string) {
      const text = rawText.trim();
      if (!text) {
        return null;
      }

      if (active) {
        setActionMode('disabled');
        cancelActive('superseded');
      }

      appendHistory({ role: 'user', content: text });
      const turnId = nextTurnId();
      active = openTurn(turnId, text, now());
      console.info('[datachat][session] turn opened', { turnId, preview: previewText(text, 80) });
      transition(turnId, 'sending');
      setActionMode('stop');

      return runTurn(turnId, text);
    },
    stop(turnId?: string) {
      if (!active) {
        return false;
      }
      if (turnId && active.turnId !== turnId) {
        return false;
      }
      return cancelActive('user');
    },
    clear() {
      cancelActive('cleared');
      history = [];
      emit({ type: 'history.changed', payload: { messages: history } });
    },
    getHistory() {
      return history;
    },
    getActiveTurn() {
      return active ? { turnId: active.turnId, status: active.status, buffer: active.buffer } : null;
    },
    getActionMode() {
      return actionMode;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
