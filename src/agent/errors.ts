/**
 * Agent Errors
 *
 * Failure taxonomy for one run. Tool-level failures (ToolNotFound,
 * ToolExecution) are reported back to the model as tool messages; the
 * others abort the run and reach the caller as a RunFailure.
 */

import type { AgentState } from '../types/agent-types.js';

export type AgentErrorKind =
  | 'connectivity'
  | 'no_tools_available'
  | 'model_service'
  | 'tool_not_found'
  | 'tool_execution'
  | 'loop_limit_exceeded'
  | 'configuration';

export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A tool server could not be reached or answered with garbage. */
export class ConnectivityError extends AgentError {
  readonly kind = 'connectivity';

  constructor(
    readonly server: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NoToolsAvailableError extends AgentError {
  readonly kind = 'no_tools_available';

  constructor(readonly servers: string[]) {
    super(
      servers.length === 0
        ? 'No tool servers are configured'
        : `No tools could be loaded from any configured server (${servers.join(', ')})`
    );
  }
}

/**
 * rate_limit / timeout / unavailable are transient; malformed_response and
 * rejected (a 4xx other than 429) are not.
 */
export type ModelFailureReason = 'rate_limit' | 'timeout' | 'malformed_response' | 'unavailable' | 'rejected';

export class ModelServiceError extends AgentError {
  readonly kind = 'model_service';

  constructor(
    readonly reason: ModelFailureReason,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.reason === 'rate_limit' || this.reason === 'timeout' || this.reason === 'unavailable';
  }
}

export class ToolNotFoundError extends AgentError {
  readonly kind = 'tool_not_found';

  constructor(readonly tool: string) {
    super(`Tool '${tool}' is not registered on any tool server`);
  }
}

export class ToolExecutionError extends AgentError {
  readonly kind = 'tool_execution';

  constructor(
    readonly tool: string,
    message: string,
    readonly code?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class LoopLimitExceededError extends AgentError {
  readonly kind = 'loop_limit_exceeded';

  constructor(
    readonly maxIterations: number,
    /** State at the moment the run was aborted */
    readonly state?: AgentState
  ) {
    super(`Agent loop exceeded the limit of ${maxIterations} reasoning step(s)`);
  }
}

export class ConfigurationError extends AgentError {
  readonly kind = 'configuration';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

// =============================================================================
// Run failure
// =============================================================================

export interface RunFailure {
  kind: AgentErrorKind | 'internal';
  message: string;
}

export function toRunFailure(error: unknown): RunFailure {
  if (error instanceof AgentError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'internal', message: error instanceof Error ? error.message : String(error) };
}
