/**
 * Agent Module
 *
 * Reasoning → tool execution loop over dynamically discovered tools.
 * Supports any LLM provider through the message types in ../types.
 */

export { AgentGraph, DEFAULT_MAX_ITERATIONS, type AgentGraphConfig } from './agent-graph.js';
export { createInitialState, appendMessages, withStatus, type InitialStateOptions } from './agent-state.js';
export {
  AgentError,
  ConnectivityError,
  NoToolsAvailableError,
  ModelServiceError,
  ToolNotFoundError,
  ToolExecutionError,
  LoopLimitExceededError,
  ConfigurationError,
  toRunFailure,
  type AgentErrorKind,
  type ModelFailureReason,
  type RunFailure,
} from './errors.js';
export type { LLMProvider, LLMChatParams, LLMResponse } from './llm-provider.js';
export { filterOrphanToolResults, isAssistantMessage, lastMessage, pendingToolCalls } from './message-history.js';
export { PromptBuilder, renderTemplate, type PromptBuilderConfig } from './prompt-builder.js';
export { ReasoningNode, type ReasoningNodeConfig, type ReasoningOutput } from './reasoning-node.js';
export { withRetry, isRetryableError, NO_RETRY, type RetryOptions } from './retry.js';
export { routeAfterReasoning, type Route } from './routing.js';
export { ToolNode, DEFAULT_TOOL_TIMEOUT_MS, type ToolConcurrency, type ToolNodeConfig } from './tool-node.js';
export {
  ResolvedToolRegistry,
  ToolRegistryClient,
  resolveToolRegistry,
  type ToolRefreshPolicy,
  type ToolRegistryOptions,
  type ToolRegistryClientOptions,
  type ToolRegistrySource,
} from './tool-registry.js';
export {
  AnthropicProvider,
  OpenAICompatibleProvider,
  createProvider,
} from './providers/index.js';
export type { ProviderConfig, ProviderType, AnthropicProviderConfig, OpenAICompatibleProviderConfig } from './providers/index.js';
