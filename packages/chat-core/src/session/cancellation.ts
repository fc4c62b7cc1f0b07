import type { CompletionService } from '../llm/contracts';
import { describeError } from '../llm/http/errors';
import type { TurnContext } from './turn-context';

export type CancelReason = 'user' | 'superseded' | 'cleared';

export function abortTurnIo(context: TurnContext): void {
  if (!context.abortController.signal.aborted) {
    context.abortController.abort();
  }
}

export function shouldNotifyService(context: TurnContext): boolean {
  return context.source !== 'predefined';
}

export function requestServerStop(service: CompletionService, turnId: string): void {
  void service.notifyStop(turnId).then(
    (result) => {
      console.info('[datachat][session] stop acknowledged', { turnId, result });
    },
    (error: unknown) => {
      console.warn('[datachat][session] stop notification failed', { turnId, reason: describeError(error) });
    },
  );
}
