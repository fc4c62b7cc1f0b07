export type ChatServiceErrorCode = 'network' | 'http' | 'parse' | 'server' | 'stream_unavailable' | 'unknown';

export interface ChatServiceError extends Error {
  code: ChatServiceErrorCode;
  retryable: boolean;
  status?: number;
}

export function makeChatServiceError(
  message: string,
  code: ChatServiceErrorCode,
  retryable: boolean,
  status?: number,
): ChatServiceError {
  return Object.assign(new Error(message), { code, retryable, status });
}

export function isChatServiceError(error: unknown): error is ChatServiceError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && 'retryable' in error;
}

export function mapHttpStatusToError(status: number, body: string): ChatServiceError {
  const detail = body.trim() ? `: ${body.trim()}` : '';
  if (status === 408 || status === 429) {
    return makeChatServiceError(`Chat service busy (${status})${detail}`, 'http', true, status);
  }
  if (status >= 500) {
    return makeChatServiceError(`Chat service error (${status})${detail}`, 'http', true, status);
  }
  return makeChatServiceError(`Chat service request failed (${status})${detail}`, 'http', false, status);
}

export function isAbortError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  if ('name' in error && error.name === 'AbortError') {
    return true;
  }
  return 'message' in error && typeof error.message === 'string' && /user aborted|operation was aborted/i.test(error.message);
}

export function isCancelledReadError(error: unknown): boolean {
  if (isAbortError(error)) {
    return true;
  }
  // A reader cancelled mid-read surfaces as a TypeError about a null or released stream.
  return error instanceof TypeError && /null|released/i.test(error.message);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}
