import type { ActionMode, AnswerSource, ChatMessage, TurnStatus, TurnSummary } from './chat';

export type SessionEvent =
  | {
      type: 'turn.status.changed';
      payload: { turnId: string; status: TurnStatus; previous: TurnStatus };
    }
  | {
      type: 'turn.content.delta';
      payload: { turnId: string; delta: string; text: string };
    }
  | {
      type: 'turn.completed';
      payload: TurnSummary & { content: string; source: AnswerSource };
    }
  | {
      type: 'turn.empty';
      payload: TurnSummary & { notice: string };
    }
  | {
      type: 'turn.cancelled';
      payload: TurnSummary & { partialContent: string };
    }
  | {
      type: 'turn.failed';
      payload: TurnSummary & { reason: string };
    }
  | {
      type: 'action.mode.changed';
      payload: { mode: ActionMode };
    }
  | {
      type: 'composer.focus';
      payload: { turnId: string | null };
    }
  | {
      type: 'history.changed';
      payload: { messages: readonly ChatMessage[] };
    };

export type SessionEventType = SessionEvent['type'];
