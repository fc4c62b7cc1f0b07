import type { AnswerSource, TurnStatus } from '@datachat/shared-types';

export interface TurnContext {
  readonly turnId: string;
  readonly status: TurnStatus;
  readonly userText: string;
  readonly buffer: string;
  readonly source: AnswerSource | null;
  readonly startedAt: number;
  readonly abortController: AbortController;
}

const TURN_TRANSITIONS: Record<TurnStatus, readonly TurnStatus[]> = {
  idle: ['sending'],
  sending: ['streaming', 'cancelled', 'failed'],
  streaming: ['completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: [],
};

export function createTurnId(now: () => number): string {
  return `turn-${now()}-${Math.random().toString(16).slice(2, 8)}`;
}

export function openTurn(turnId: string, userText: string, startedAt: number): TurnContext {
  return {
    turnId,
    status: 'idle',
    userText,
    buffer: '',
    source: null,
    startedAt,
    abortController: new AbortController(),
  };
}

export function canTransition(from: TurnStatus, to: TurnStatus): boolean {
  return TURN_TRANSITIONS[from].includes(to);
}

export function advanceTurn(context: TurnContext, status: TurnStatus): TurnContext {
  if (!canTransition(context.status, status)) {
    throw new Error(`Illegal turn transition for ${context.turnId}: ${context.status} -> ${status}`);
  }
  return { ...context, status };
}

export function appendContent(context: TurnContext, fragment: string): TurnContext {
  if (context.status !== 'streaming') {
    throw new Error(`Cannot append content to ${context.turnId} while ${context.status}`);
  }
  return { ...context, buffer: context.buffer + fragment };
}

export function assignSource(context: TurnContext, source: AnswerSource): TurnContext {
  return { ...context, source };
}
