/**
 * LLM Provider Interface
 *
 * Provider-neutral abstraction for language model interactions.
 * Providers convert AgentMessage history to their wire format at the
 * boundary and raise ModelServiceError for every failed call.
 */

import type { AgentMessage, AgentToolDefinition, ToolCallRequest } from '../types/agent-types.js';

export interface LLMChatParams {
  model: string;
  maxTokens: number;
  temperature?: number;
  system: string;
  /** Orphan-free history; may contain system messages after the first turn */
  messages: AgentMessage[];
  tools: AgentToolDefinition[];
}

export interface LLMResponse {
  /** Extracted text (empty string if only tool calls) */
  text: string;
  /** Tool calls requested by the model (empty when the model is done) */
  toolCalls: ToolCallRequest[];
  /** Provider stop reason, for logging */
  stopReason: string;
  /** Token usage statistics */
  usage: { inputTokens: number; outputTokens: number };
}

export interface LLMProvider {
  readonly name: string;

  /** Send messages to the model, get back text and/or tool calls */
  chat(params: LLMChatParams): Promise<LLMResponse>;
}
