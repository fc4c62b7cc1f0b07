export interface ChatEndpoints {
  stream: string;
  stop: string;
  chat: string;
}

export interface ChatSettings {
  schemaVersion: 1;
  baseUrl: string;
  endpoints: ChatEndpoints;
  temperature: number;
  maxTokens: number;
  streamingEnabled: boolean;
  typingDelayMs: number;
  typingSliceSize: number;
}

export const DEFAULT_CHAT_SETTINGS: ChatSettings = {
  schemaVersion: 1,
  baseUrl: '',
  endpoints: {
    stream: '/api/chat/stream',
    stop: '/api/chat/stop',
    chat: '/api/chat',
  },
  temperature: 0.7,
  maxTokens: 4096,
  streamingEnabled: true,
  typingDelayMs: 30,
  typingSliceSize: 3,
};
