import type { ChatMessage } from '@datachat/shared-types';

export interface CompletionRequest {
  turnId: string;
  messages: readonly ChatMessage[];
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface CompletionService {
  openStream(request: CompletionRequest): Promise<ReadableStream<Uint8Array>>;
  completeOnce(request: CompletionRequest): Promise<string>;
  notifyStop(turnId: string): Promise<unknown>;
}
