export { ChatOrchestrator } from './ChatOrchestrator';
export type { ChatOrchestratorDeps, ChatOrchestratorOptions } from './ChatOrchestrator';
export { AllModelsExhaustedError, HistoryValidationError } from './errors';
export type { CandidateFailure } from './errors';
export { runWithFallback, toCandidates, orderCandidates } from './fallback';
export type { FallbackOutcome } from './fallback';
export { createToolCallParser } from './toolCallParser';
export type { ToolCall, ToolCallParser } from './toolCallParser';
export { appendExchange, buildMessages, parseHistory, parseHistoryField } from './history';
