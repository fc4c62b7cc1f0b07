import type {
  ActionMode,
  ChatMessage,
  ChatSettings,
  SessionEvent,
  TerminalTurnStatus,
  TurnStatus,
} from '@datachat/shared-types';
import type { CompletionService } from '../llm/contracts';
import type { PredefinedAnswer } from './predefined-answers';

export interface AnswerRenderRequest {
  turnId: string;
  text: string;
  final: boolean;
}

export interface TurnOutcome {
  turnId: string;
  status: TerminalTurnStatus;
  content: string;
}

export interface ActiveTurnView {
  turnId: string;
  status: TurnStatus;
  buffer: string;
}

export interface ChatSession {
  submit(text: string): Promise<TurnOutcome | null>;
  stop(turnId?: string): boolean;
  clear(): void;
  getHistory(): readonly ChatMessage[];
  getActiveTurn(): ActiveTurnView | null;
  getActionMode(): ActionMode;
  subscribe(listener: (event: SessionEvent) => void): () => void;
}

export interface ChatSessionConfig {
  settings: ChatSettings;
  completionService?: CompletionService;
  fetch?: typeof fetch;
  predefinedAnswers?: readonly PredefinedAnswer[];
  renderAnswer?: (request: AnswerRenderRequest) => Promise<void> | void;
  now?: () => number;
  createTurnId?: () => string;
}
