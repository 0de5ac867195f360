/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorInfo } from './result.js';
export {
  success,
  failure,
  failWith,
  isSuccess,
  isFailure,
} from './result.js';
export type { ActorContext } from './auth.js';
export type { PaginationParams, PaginatedResult } from './pagination.js';
export {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  normalizePaginationParams,
} from './pagination.js';
export {
  ANONYMOUS_NAMESPACE,
  conversationNamespace,
  scopeConversationKey,
  splitConversationKey,
} from './auth.js';
export type {
  ToolName,
  ToolFailureReason,
  ToolCallRequest,
  ToolSuccess,
  ToolFailure,
  ToolResult,
  ToolDefinition,
} from './tool.js';
export { TOOL_NAMES, isToolName } from './tool.js';
export type {
  Message,
  UserMessage,
  AssistantMessage,
  ToolResultMessage,
  ConversationState,
  ConversationSummary,
  ConversationListPosition,
} from './conversation.js';
export {
  MAX_TITLE_LENGTH,
  createConversationState,
  appendToState,
  defaultTitle,
  latestAnswer,
} from './conversation.js';
export type {
  Mode,
  QuickDecisionPayload,
  RecommendationPayload,
  ProductDiscoveryPayload,
  ResearchPayload,
  TerminalPayloadByMode,
  QuickDecisionAnswer,
  RecommendationSetAnswer,
  ProductDiscoveryAnswer,
  ResearchAnswer,
  TerminalAnswer,
  SourceLink,
  QuickDecisionResponse,
  RecommendationResponse,
  ShoppingLink,
  DiscoveredProduct,
  ProductDiscoveryResponse,
  ResearchResponse,
  ResponsePayload,
} from './answer.js';
export { MODES } from './answer.js';
export type {
  LLMMessage,
  LLMToolCall,
  LLMToolDefinition,
  LLMRequest,
  LLMResponse,
  LLMCallOptions,
  LLMClient,
  OrchestratorConfig,
  RequestContext,
  PromptBuildOptions,
  PromptPayload,
  LoopState,
  OrchestrationErrorCode,
  OrchestrationError,
  RunInput,
  RunResult,
  ToolCallSummary,
  TurnEvent,
  TurnEventSink,
} from './orchestrator.js';
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  resolveRunTimeout,
} from './orchestrator.js';
export type { ShareRecord, EncodeShareParams } from './share.js';
export type { AuditEvent } from './audit.js';
export { AUDIT_ACTIONS } from './audit.js';
