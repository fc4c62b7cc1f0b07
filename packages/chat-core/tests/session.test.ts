import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CHAT_SETTINGS, type ChatSettings, type SessionEvent } from '@datachat/shared-types';
import type { CompletionRequest, CompletionService } from '../src/llm/contracts';
import { makeChatServiceError } from '../src/llm/http/errors';
import { createChatSession, NO_RESPONSE_NOTICE } from '../src/session/create-chat-session';
import { DEFAULT_PREDEFINED_ANSWERS } from '../src/session/predefined-answers';
import { sliceForTyping } from '../src/session/typing';
import type { AnswerRenderRequest, ChatSession } from '../src/session/types';

const encoder = new TextEncoder();

function records(...items: object[]): string[] {
  return items.map((item) => `data: ${JSON.stringify(item)}\n\n`);
}

function makeStream(chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

function abortableStream(signal: AbortSignal | undefined, first?: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      if (first) {
        controller.enqueue(encoder.encode(first));
      }
      signal?.addEventListener('abort', () => {
        controller.error(new DOMException('The operation was aborted.', 'AbortError'));
      });
    },
  });
}

function controlledStream() {
  let push: (text: string) => void = () => {};
  let close: () => void = () => {};
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      push = (text) => controller.enqueue(encoder.encode(text));
      close = () => controller.close();
    },
  });
  return { stream, push: (text: string) => push(text), close: () => close() };
}

function createFakeService() {
  return {
    openStream: vi.fn<(request: CompletionRequest) => Promise<ReadableStream<Uint8Array>>>(),
    completeOnce: vi.fn<(request: CompletionRequest) => Promise<string>>(),
    notifyStop: vi.fn<(turnId: string) => Promise<unknown>>().mockResolvedValue({ success: true }),
  } satisfies CompletionService;
}

function setup(overrides: Partial<ChatSettings> = {}) {
  const service = createFakeService();
  const renderAnswer = vi.fn<(request: AnswerRenderRequest) => void>();
  let counter = 0;
  const session = createChatSession({
    settings: { ...DEFAULT_CHAT_SETTINGS, typingDelayMs: 0, ...overrides },
    completionService: service,
    renderAnswer,
    now: () => 1000,
    createTurnId: () => `turn-${++counter}`,
  });
  const events: SessionEvent[] = [];
  session.subscribe((event) => events.push(event));
  return { service, renderAnswer, session, events };
}

function waitForEvent(session: ChatSession, matches: (event: SessionEvent) => boolean): Promise<void> {
  return new Promise((resolve) => {
    const unsubscribe = session.subscribe((event) => {
      if (matches(event)) {
        unsubscribe();
        resolve();
      }
    });
  });
}

function ofType<T extends SessionEvent['type']>(events: SessionEvent[], type: T): Extract<SessionEvent, { type: T }>[] {
  return events.filter((event): event is Extract<SessionEvent, { type: T }> => event.type === type);
}

describe('chat session', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('accumulates streamed content into one assistant message', async () => {
    const { service, renderAnswer, session, events } = setup();
    service.openStream.mockResolvedValue(makeStream(records({ content: 'A' }, { content: 'B' })));

    const outcome = await session.submit('hello');

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'completed', content: 'AB' });
    expect(session.getHistory()).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'AB' },
    ]);
    expect(service.openStream).toHaveBeenCalledWith(
      expect.objectContaining({
        turnId: 'turn-1',
        messages: [{ role: 'user', content: 'hello' }],
        temperature: 0.7,
        maxTokens: 4096,
      }),
    );
    expect(renderAnswer.mock.calls.map(([request]) => [request.text, request.final])).toEqual([
      ['A', false],
      ['AB', false],
      ['AB', true],
    ]);
    expect(ofType(events, 'turn.status.changed').map((event) => event.payload.status)).toEqual([
      'sending',
      'streaming',
      'completed',
    ]);
    expect(ofType(events, 'turn.completed')[0]?.payload).toMatchObject({ content: 'AB', source: 'stream' });
    expect(ofType(events, 'composer.focus')).toHaveLength(1);
    expect(session.getActionMode()).toBe('send');
    expect(session.getActiveTurn()).toBeNull();
  });

  it('completes with a notice when the stream stops without content', async () => {
    const { service, renderAnswer, session, events } = setup();
    service.openStream.mockResolvedValue(makeStream(records({ content: '', stopped: true })));

    const outcome = await session.submit('anything there?');

    expect(outcome?.status).toBe('completed');
    expect(ofType(events, 'turn.empty')[0]?.payload.notice).toBe(NO_RESPONSE_NOTICE);
    expect(ofType(events, 'turn.completed')).toHaveLength(0);
    expect(session.getHistory()).toEqual([{ role: 'user', content: 'anything there?' }]);
    expect(renderAnswer).not.toHaveBeenCalled();
  });

  it('stops reading at the stop record', async () => {
    const { service, session } = setup();
    service.openStream.mockResolvedValue(
      makeStream(records({ content: 'kept' }, { stopped: true }, { content: 'ignored' })),
    );

    await expect(session.submit('q')).resolves.toMatchObject({ status: 'completed', content: 'kept' });
  });

  it('skips malformed records and keeps the rest of the answer', async () => {
    const { service, session } = setup();
    service.openStream.mockResolvedValue(makeStream(['data: {oops\n', ...records({ content: 'ok' })]));

    await expect(session.submit('q')).resolves.toMatchObject({ status: 'completed', content: 'ok' });
  });

  it('fails the turn with the server error message verbatim', async () => {
    const { service, session, events } = setup();
    service.openStream.mockResolvedValue(makeStream(records({ content: 'part' }, { error: 'model overloaded' })));

    const outcome = await session.submit('q');

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'failed', content: 'part' });
    expect(ofType(events, 'turn.failed')[0]?.payload.reason).toBe('model overloaded');
    expect(session.getHistory()).toEqual([{ role: 'user', content: 'q' }]);
    expect(session.getActionMode()).toBe('send');
  });

  it('fails the turn when the stream endpoint rejects the request', async () => {
    const { service, session, events } = setup();
    service.openStream.mockRejectedValue(makeChatServiceError('Chat service error (500): bad', 'http', true, 500));

    const outcome = await session.submit('q');

    expect(outcome?.status).toBe('failed');
    expect(ofType(events, 'turn.failed')[0]?.payload.reason).toBe('Chat service error (500): bad');
    expect(ofType(events, 'turn.status.changed').map((event) => event.payload.status)).toEqual(['sending', 'failed']);
    expect(session.getActionMode()).toBe('send');
  });

  it('fails the turn when rendering throws a null-reference TypeError', async () => {
    const { service, renderAnswer, session, events } = setup();
    service.openStream.mockResolvedValue(makeStream(records({ content: 'A' })));
    renderAnswer.mockImplementation(() => {
      throw new TypeError("Cannot read properties of null (reading 'replaceWith')");
    });

    const outcome = await session.submit('hello');

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'failed', content: 'A' });
    expect(ofType(events, 'turn.failed')[0]?.payload.reason).toBe("Cannot read properties of null (reading 'replaceWith')");
    expect(ofType(events, 'turn.cancelled')).toEqual([]);
    expect(service.notifyStop).not.toHaveBeenCalled();
    expect(session.getActionMode()).toBe('send');
  });

  it('falls back to a single-shot answer when streaming is unavailable', async () => {
    const { service, renderAnswer, session, events } = setup();
    service.openStream.mockRejectedValue(makeChatServiceError('no body', 'stream_unavailable', false));
    service.completeOnce.mockResolvedValue('single answer');

    const outcome = await session.submit('q');

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'completed', content: 'single answer' });
    expect(ofType(events, 'turn.completed')[0]?.payload.source).toBe('single_shot');
    expect(renderAnswer).toHaveBeenCalledTimes(1);
    expect(renderAnswer).toHaveBeenCalledWith({ turnId: 'turn-1', text: 'single answer', final: true });
  });

  it('uses the single-shot endpoint when streaming is disabled', async () => {
    const { service, session } = setup({ streamingEnabled: false });
    service.completeOnce.mockResolvedValue('direct');

    await expect(session.submit('q')).resolves.toMatchObject({ status: 'completed', content: 'direct' });
    expect(service.openStream).not.toHaveBeenCalled();
  });

  it('plays a predefined answer without calling the service', async () => {
    const { service, renderAnswer, session, events } = setup();
    const answer = DEFAULT_PREDEFINED_ANSWERS[0]?.answer ?? '';
    const slices = sliceForTyping(answer, 3);

    const outcome = await session.submit('제타큐브는 어떤 회사야?');

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'completed', content: answer });
    expect(service.openStream).not.toHaveBeenCalled();
    expect(service.completeOnce).not.toHaveBeenCalled();
    expect(ofType(events, 'turn.content.delta').map((event) => event.payload.delta)).toEqual(slices);
    expect(renderAnswer).toHaveBeenCalledTimes(slices.length + 1);
    expect(renderAnswer).toHaveBeenLastCalledWith({ turnId: 'turn-1', text: answer, final: true });
    expect(ofType(events, 'turn.completed')[0]?.payload.source).toBe('predefined');
    expect(session.getHistory().at(-1)).toEqual({ role: 'assistant', content: answer });
  });

  it('cancels quietly on stop and notifies the server', async () => {
    const { service, session, events } = setup();
    service.openStream.mockImplementation(async (request) =>
      abortableStream(request.signal, records({ content: 'partial' })[0]),
    );
    session.subscribe((event) => {
      if (event.type === 'turn.content.delta') {
        session.stop(event.payload.turnId);
      }
    });

    const outcome = await session.submit('q');

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'cancelled', content: 'partial' });
    expect(ofType(events, 'turn.failed')).toHaveLength(0);
    expect(ofType(events, 'turn.cancelled')[0]?.payload.partialContent).toBe('partial');
    expect(service.notifyStop).toHaveBeenCalledWith('turn-1');
    expect(session.getHistory()).toEqual([{ role: 'user', content: 'q' }]);
    expect(session.getActionMode()).toBe('send');
  });

  it('cancels a turn that is still sending and discards the stream that opens later', async () => {
    const { service, session, events } = setup();
    let resolveOpen: (stream: ReadableStream<Uint8Array>) => void = () => {};
    service.openStream.mockImplementation(
      () =>
        new Promise((resolve) => {
          resolveOpen = resolve;
        }),
    );
    const onCancel = vi.fn();
    const late = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode(records({ content: 'late' })[0]));
      },
      cancel: onCancel,
    });

    const pending = session.submit('hello');
    expect(session.getActiveTurn()?.status).toBe('sending');
    expect(session.stop()).toBe(true);
    resolveOpen(late);
    const outcome = await pending;

    expect(outcome).toEqual({ turnId: 'turn-1', status: 'cancelled', content: '' });
    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(ofType(events, 'turn.content.delta')).toEqual([]);
    expect(ofType(events, 'turn.status.changed').map((event) => event.payload.status)).toEqual(['sending', 'cancelled']);
    expect(service.notifyStop).toHaveBeenCalledWith('turn-1');
    expect(session.getActionMode()).toBe('send');
  });

  it('supersedes the active turn when a new message is submitted', async () => {
    const { service, session, events } = setup();
    service.openStream
      .mockImplementationOnce(async (request) => abortableStream(request.signal))
      .mockImplementationOnce(async () => makeStream(records({ content: 'B' })));

    const streaming = waitForEvent(
      session,
      (event) => event.type === 'turn.status.changed' && event.payload.turnId === 'turn-1' && event.payload.status === 'streaming',
    );
    const first = session.submit('first');
    await streaming;
    const second = await session.submit('second');
    const firstOutcome = await first;

    expect(firstOutcome).toEqual({ turnId: 'turn-1', status: 'cancelled', content: '' });
    expect(second).toEqual({ turnId: 'turn-2', status: 'completed', content: 'B' });
    expect(service.notifyStop).toHaveBeenCalledWith('turn-1');
    expect(service.openStream.mock.calls[1]?.[0].messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'user', content: 'second' },
    ]);
    expect(ofType(events, 'action.mode.changed').map((event) => event.payload.mode)).toEqual([
      'stop',
      'disabled',
      'send',
      'stop',
      'send',
    ]);

    const cancelledAt = events.findIndex((event) => event.type === 'turn.cancelled');
    const secondStreamingAt = events.findIndex(
      (event) => event.type === 'turn.status.changed' && event.payload.turnId === 'turn-2' && event.payload.status === 'streaming',
    );
    expect(cancelledAt).toBeGreaterThan(-1);
    expect(cancelledAt).toBeLessThan(secondStreamingAt);
    expect(ofType(events, 'turn.failed')).toHaveLength(0);
  });

  it('discards late content from a superseded stream', async () => {
    const { service, renderAnswer, session, events } = setup();
    const stale = controlledStream();
    service.openStream
      .mockImplementationOnce(async () => stale.stream)
      .mockImplementationOnce(async () => makeStream(records({ content: 'fresh' })));

    const streaming = waitForEvent(session, (event) => event.type === 'turn.status.changed' && event.payload.status === 'streaming');
    const first = session.submit('first');
    await streaming;
    await session.submit('second');

    stale.push(records({ content: 'STALE' })[0] ?? '');
    stale.close();
    const firstOutcome = await first;

    expect(firstOutcome?.status).toBe('cancelled');
    expect(session.getHistory().at(-1)).toEqual({ role: 'assistant', content: 'fresh' });
    expect(renderAnswer.mock.calls.every(([request]) => request.turnId === 'turn-2')).toBe(true);
    expect(ofType(events, 'turn.content.delta').map((event) => event.payload.turnId)).toEqual(['turn-2']);
  });

  it('skips the stop notification for a superseded predefined answer', async () => {
    const { service, session } = setup({ typingDelayMs: 5 });
    service.openStream.mockResolvedValue(makeStream(records({ content: 'B' })));

    const typing = waitForEvent(session, (event) => event.type === 'turn.content.delta' && event.payload.turnId === 'turn-1');
    const first = session.submit('NanoDC 소개해줘');
    await typing;
    await session.submit('second');

    await expect(first).resolves.toMatchObject({ turnId: 'turn-1', status: 'cancelled' });
    expect(service.notifyStop).not.toHaveBeenCalled();
  });

  it('ignores blank input and unknown stop targets', async () => {
    const { session, events } = setup();

    await expect(session.submit('   ')).resolves.toBeNull();
    expect(session.stop()).toBe(false);
    expect(session.stop('turn-404')).toBe(false);
    expect(events).toEqual([]);
  });

  it('clears history and cancels the active turn', async () => {
    const { service, session, events } = setup();
    service.openStream.mockImplementation(async (request) => abortableStream(request.signal));

    const streaming = waitForEvent(session, (event) => event.type === 'turn.status.changed' && event.payload.status === 'streaming');
    const pending = session.submit('q');
    await streaming;
    session.clear();

    await expect(pending).resolves.toMatchObject({ status: 'cancelled' });
    expect(session.getHistory()).toEqual([]);
    expect(ofType(events, 'history.changed').at(-1)?.payload.messages).toEqual([]);
    expect(session.getActionMode()).toBe('send');
  });
});
