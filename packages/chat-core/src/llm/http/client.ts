import type {
  ChatEndpoints,
  ChatSettings,
  SingleShotResponseBody,
  StopRequestBody,
  StreamRequestBody,
} from '@datachat/shared-types';
import { summarizeConversation } from '@datachat/storage-local';
import { z } from 'zod';
import type { CompletionRequest } from '../contracts';
import { describeError, isAbortError, makeChatServiceError, mapHttpStatusToError } from './errors';

export interface ChatServiceClientConfig {
  settings: ChatSettings;
  fetch?: typeof fetch;
}

const singleShotSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  error: z.string().optional(),
});

export function resolveEndpoint(settings: ChatSettings, endpoint: keyof ChatEndpoints): string {
  return `${settings.baseUrl}${settings.endpoints[endpoint]}`;
}

export function buildStreamBody(request: CompletionRequest): StreamRequestBody {
  return {
    messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    request_id: request.turnId,
  };
}

type RequestBody = StreamRequestBody | StopRequestBody | Omit<StreamRequestBody, 'request_id'>;

function loggableBody(body: RequestBody): object {
  if ('messages' in body) {
    return { ...body, messages: summarizeConversation(body.messages) };
  }
  return body;
}

async function postJson(
  config: ChatServiceClientConfig,
  endpoint: keyof ChatEndpoints,
  body: RequestBody,
  signal?: AbortSignal,
): Promise<Response> {
  const url = resolveEndpoint(config.settings, endpoint);
  const fetchImpl = config.fetch ?? fetch;

  console.info('[datachat][http] request', { url, body: loggableBody(body) });

  try {
    return await fetchImpl(url, {
      method: 'POST',
      signal,
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    throw makeChatServiceError(`Network request failed: ${describeError(error)}`, 'network', true);
  }
}

export async function openChatStream(
  config: ChatServiceClientConfig,
  request: CompletionRequest,
): Promise<ReadableStream<Uint8Array>> {
  const response = await postJson(config, 'stream', buildStreamBody(request), request.signal);

  if (!response.ok) {
    throw mapHttpStatusToError(response.status, await response.text());
  }

  if (!response.body) {
    throw makeChatServiceError('Chat service response body is empty', 'stream_unavailable', false);
  }

  return response.body;
}

export async function completeChatOnce(config: ChatServiceClientConfig, request: CompletionRequest): Promise<string> {
  const { request_id: _requestId, ...body } = buildStreamBody(request);
  const response = await postJson(config, 'chat', body, request.signal);

  if (!response.ok) {
    throw mapHttpStatusToError(response.status, await response.text());
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch {
    throw makeChatServiceError('Failed to parse chat service response JSON', 'parse', false);
  }

  const parsed = singleShotSchema.safeParse(payload);
  if (!parsed.success) {
    throw makeChatServiceError('Unexpected chat service response shape', 'parse', false);
  }

  const result: SingleShotResponseBody = parsed.data;
  if (!result.success) {
    throw makeChatServiceError(result.error || 'Unknown chat service error', 'server', false);
  }
  return result.message ?? '';
}

export async function sendStopSignal(config: ChatServiceClientConfig, turnId: string): Promise<unknown> {
  const response = await postJson(config, 'stop', { request_id: turnId });

  if (!response.ok) {
    throw mapHttpStatusToError(response.status, await response.text());
  }

  try {
    return (await response.json()) as unknown;
  } catch {
    throw makeChatServiceError('Failed to parse stop acknowledgement JSON', 'parse', false);
  }
}
