/**
 * Orchestrator Exports
 *
 * LLM PROVIDER: any OpenAI-compatible endpoint, OpenRouter by default
 * (https://openrouter.ai/api/v1, key in OPENROUTER_API_KEY)
 */

export { createLLMClient } from './llm-client.js';
export type { LLMClientConfig } from './llm-client.js';
export {
  createPromptBuilder,
  CORE_INSTRUCTIONS,
  MODE_TEMPLATES,
  ANSWER_CONTRACTS,
} from './prompt-builder.js';
export type { PromptBuilder } from './prompt-builder.js';
export {
  parseTerminalAnswer,
  stripCodeFence,
  terminalAnswerSchema,
  TERMINAL_SCHEMAS,
} from './terminal.js';
export {
  createInMemoryConversationLock,
  createRedisConversationLock,
} from './conversation-lock.js';
export type {
  ConversationLock,
  LockHandle,
  AcquireOptions,
  LeaseClient,
  RedisLockConfig,
} from './conversation-lock.js';
export { createToolLoop, RunDeadlineError, abortCode } from './tool-loop.js';
export type {
  ToolLoop,
  ToolLoopDeps,
  ToolLoopInput,
  ToolLoopResult,
  ToolLoopUsage,
} from './tool-loop.js';
export { createOrchestrator } from './orchestrator.js';
export type {
  Orchestrator,
  OrchestratorDeps,
  OrchestratorStore,
  OrchestratorShareEncoder,
} from './orchestrator.js';
