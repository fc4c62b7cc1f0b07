import type { StreamEvent } from '@datachat/shared-types';
import { z } from 'zod';
import { describeError } from './errors';

const DATA_PREFIX = 'data: ';
const DONE_MARKER = '[DONE]';

const streamRecordSchema = z
  .object({
    content: z.string().optional(),
    stopped: z.boolean().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export interface MalformedRecord {
  payload: string;
  reason: string;
  // JSON that failed to parse may still be a fragment of a larger value; shape errors may not.
  partial: boolean;
}

export type StreamRecordResult = { ok: true; events: StreamEvent[] } | ({ ok: false } & MalformedRecord);

export interface ParseChatEventStreamOptions {
  onMalformedRecord?: (record: MalformedRecord) => void;
}

export function parseStreamRecord(payload: string): StreamRecordResult {
  if (payload.trim() === DONE_MARKER) {
    return { ok: true, events: [{ type: 'stopped' }] };
  }

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    return { ok: false, payload, reason: describeError(error), partial: true };
  }

  const parsed = streamRecordSchema.safeParse(json);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ');
    return { ok: false, payload, reason, partial: false };
  }

  const record = parsed.data;
  if (record.error) {
    return { ok: true, events: [{ type: 'error', message: record.error }] };
  }

  const events: StreamEvent[] = [];
  if (record.content) {
    events.push({ type: 'content', text: record.content });
  }
  if (record.stopped) {
    events.push({ type: 'stopped' });
  }
  return { ok: true, events };
}

function decodeLine(rawLine: string, options: ParseChatEventStreamOptions): StreamEvent[] {
  const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
  if (!line.startsWith(DATA_PREFIX)) {
    return [];
  }

  const result = parseStreamRecord(line.slice(DATA_PREFIX.length));
  if (result.ok) {
    return result.events;
  }

  const malformed: MalformedRecord = { payload: result.payload, reason: result.reason, partial: result.partial };
  console.debug('[datachat][stream] skipped malformed record', {
    reason: malformed.reason,
    partial: malformed.partial,
    payload: malformed.payload.slice(0, 120),
  });
  options.onMalformedRecord?.(malformed);
  return [];
}

export async function* parseChatEventStream(
  stream: ReadableStream<Uint8Array>,
  options: ParseChatEventStreamOptions = {},
): AsyncGenerator<StreamEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let closed = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        closed = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        yield* decodeLine(line, options);
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield* decodeLine(buffer, options);
    }
  } finally {
    if (!closed) {
      try {
        await reader.cancel();
      } catch (error) {
        console.debug('[datachat][stream] reader cancel after early exit failed', error);
      }
    }
    reader.releaseLock();
  }
}
