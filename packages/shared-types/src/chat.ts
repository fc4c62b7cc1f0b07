export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export type TurnStatus = 'idle' | 'sending' | 'streaming' | 'completed' | 'cancelled' | 'failed';

export type TerminalTurnStatus = Extract<TurnStatus, 'completed' | 'cancelled' | 'failed'>;

export type AnswerSource = 'stream' | 'single_shot' | 'predefined';

export type ActionMode = 'send' | 'stop' | 'disabled';

export interface TurnTiming {
  startedAt: number;
  endedAt?: number;
  durationMs?: number;
}

export interface TurnSummary {
  turnId: string;
  status: TurnStatus;
  timing: TurnTiming;
}

export function isTerminalStatus(status: TurnStatus): status is TerminalTurnStatus {
  return status === 'completed' || status === 'cancelled' || status === 'failed';
}
