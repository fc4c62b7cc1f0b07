export type { CompletionRequest, CompletionService } from './llm/contracts';
export { createHttpCompletionService } from './llm/http/adapter';
export {
  buildStreamBody,
  completeChatOnce,
  openChatStream,
  resolveEndpoint,
  sendStopSignal,
  type ChatServiceClientConfig,
} from './llm/http/client';
export {
  describeError,
  isAbortError,
  isCancelledReadError,
  isChatServiceError,
  makeChatServiceError,
  mapHttpStatusToError,
  type ChatServiceError,
  type ChatServiceErrorCode,
} from './llm/http/errors';
export {
  parseChatEventStream,
  parseStreamRecord,
  type MalformedRecord,
  type ParseChatEventStreamOptions,
  type StreamRecordResult,
} from './llm/http/stream';
export { createScriptedCompletionService } from './llm/fake-list/adapter';
export {
  BUILTIN_SCRIPTED_SCENARIOS,
  getScriptedScenario,
  listScriptedScenarios,
  type ScriptedFailure,
  type ScriptedScenario,
} from './llm/fake-list/scenario';
export { createChatSession, NO_RESPONSE_NOTICE } from './session/create-chat-session';
export { DEFAULT_PREDEFINED_ANSWERS, findPredefinedAnswer, type PredefinedAnswer } from './session/predefined-answers';
export {
  advanceTurn,
  appendContent,
  canTransition,
  createTurnId,
  openTurn,
  type TurnContext,
} from './session/turn-context';
export { sliceForTyping, wait } from './session/typing';
export type { ActiveTurnView, AnswerRenderRequest, ChatSession, ChatSessionConfig, TurnOutcome } from './session/types';
