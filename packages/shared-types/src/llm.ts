export type StreamEvent =
  | { type: 'content'; text: string }
  | { type: 'stopped' }
  | { type: 'error'; message: string };

export interface StreamRecord {
  content?: string;
  stopped?: boolean;
  error?: string;
}

export interface StreamRequestBody {
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  temperature: number;
  max_tokens: number;
  request_id: string;
}

export interface StopRequestBody {
  request_id: string;
}

export interface SingleShotResponseBody {
  success: boolean;
  message?: string;
  error?: string;
}
