import type { CompletionService } from '../contracts';
import { completeChatOnce, openChatStream, sendStopSignal, type ChatServiceClientConfig } from './client';

export function createHttpCompletionService(config: ChatServiceClientConfig): CompletionService {
  return {
    openStream(request) {
      return openChatStream(config, request);
    },
    completeOnce(request) {
      return completeChatOnce(config, request);
    },
    notifyStop(turnId) {
      return sendStopSignal(config, turnId);
    },
  };
}
