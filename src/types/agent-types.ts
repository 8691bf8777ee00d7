/**
 * Agent Core Types
 *
 * Message, state and tool types shared by the reasoning loop, the model
 * providers and the tool registry.
 */

// ============================================================================
// Tool System Types
// ============================================================================

/**
 * JSON Schema of a tool's arguments, as published by its server
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * Tool definition handed to the model (compatible with Anthropic, OpenAI, etc.)
 */
export interface AgentToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

/**
 * A tool discovered on a remote tool server
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  /** Logical server name from the registry configuration */
  readonly server: string;
  readonly endpoint: string;
}

/**
 * Result of executing a tool
 */
export interface ToolResult {
  content: string;
  isError?: boolean;
}

/**
 * Logical server name → endpoint (`https://…` or `lambda:<function>`)
 */
export type RegistryConfiguration = Record<string, string>;

// ============================================================================
// Message Types
// ============================================================================

/**
 * A tool invocation requested by the model
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls: ToolCallRequest[];
}

export interface ToolMessage {
  role: 'tool';
  /** Id of the ToolCallRequest this message answers */
  toolCallId: string;
  name: string;
  content: string;
  isError?: boolean;
}

export type AgentMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

// ============================================================================
// Agent State Types
// ============================================================================

export type AgentStatus = 'reasoning' | 'executing_tools' | 'terminated';

/**
 * State threaded through one run of the loop
 */
export interface AgentState {
  /** Append-only within a run */
  messages: AgentMessage[];
  /** Completed reasoning steps */
  iteration: number;
  status: AgentStatus;
  /** Graph message id of the e-mail that triggered the run */
  messageId?: string;
  /** Raw change notification the run was started from */
  notification?: unknown;
}

// ============================================================================
// Agent Loop Types
// ============================================================================

/**
 * Usage statistics for a run
 */
export interface AgentUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of running the agent loop
 */
export interface AgentRunResult {
  state: AgentState;
  /** Text of the final assistant message */
  response: string;
  usage: AgentUsageStats;
}
