/**
 * Tool Execution Node
 *
 * Runs every tool call on the latest assistant message and answers each with
 * one tool message, in request order. Failures become error payloads the
 * model can read; nothing is thrown past this node.
 */

import { ToolExecutionError, ToolNotFoundError } from './errors.js';
import { pendingToolCalls } from './message-history.js';
import type { ResolvedToolRegistry } from './tool-registry.js';
import { createLogger, preview } from '../logging/logger.js';
import type { AgentState, ToolCallRequest, ToolDescriptor, ToolMessage } from '../types/agent-types.js';

const log = createLogger('ToolNode');

export type ToolConcurrency = 'sequential' | 'parallel';

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/** Argument injected from the run context when a tool declares it */
export const MESSAGE_ID_ARGUMENT = 'message_id';

export interface ToolNodeConfig {
  concurrency?: ToolConcurrency;
  /** Per-invocation timeout in milliseconds */
  timeoutMs?: number;
}

export interface ToolErrorPayload {
  error: 'tool_not_found' | 'tool_execution_error';
  tool: string;
  message: string;
  availableTools?: string[];
}

export class ToolNode {
  private concurrency: ToolConcurrency;
  private timeoutMs: number;

  constructor(config: ToolNodeConfig = {}) {
    this.concurrency = config.concurrency ?? 'sequential';
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  async run(state: AgentState, registry: ResolvedToolRegistry): Promise<ToolMessage[]> {
    const calls = pendingToolCalls(state.messages);
    if (calls.length === 0) {
      log.warn('Tool node reached without tool calls on the latest message');
      return [];
    }

    const execute = (call: ToolCallRequest) => this.executeSingle(call, state, registry);

    if (this.concurrency === 'parallel') {
      // Promise.all keeps input order, whatever order the calls settle in.
      return Promise.all(calls.map(execute));
    }

    const results: ToolMessage[] = [];
    for (const call of calls) {
      results.push(await execute(call));
    }
    return results;
  }

  private async executeSingle(
    call: ToolCallRequest,
    state: AgentState,
    registry: ResolvedToolRegistry
  ): Promise<ToolMessage> {
    const descriptor = registry.get(call.name);
    if (!descriptor) {
      const error = new ToolNotFoundError(call.name);
      log.error(`Rejecting call to unknown tool '${call.name}'`);
      return errorMessage(call, {
        error: 'tool_not_found',
        tool: call.name,
        message: error.message,
        availableTools: registry.names(),
      });
    }

    const args = withRunContext(call.input, descriptor, state);
    log.info(`🔧 Executing tool: ${call.name} (${descriptor.server})`);
    log.debug(`${call.name} arguments: ${preview(JSON.stringify(args), 500)}`);

    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      const result = await registry.invoke(call.name, args, { signal });
      if (result.isError) {
        log.warn(`❌ ${call.name} reported an error: ${preview(result.content, 300)}`);
      } else {
        log.info(`✅ ${call.name} completed`);
        log.debug(`${call.name} result: ${preview(result.content)}`);
      }
      return {
        role: 'tool',
        toolCallId: call.id,
        name: call.name,
        content: result.content,
        ...(result.isError ? { isError: true } : {}),
      };
    } catch (error) {
      const message = signal.aborted
        ? `Tool '${call.name}' timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      log.error(`❌ ${call.name} FAILED: ${message}`);
      return errorMessage(call, {
        error: error instanceof ToolNotFoundError ? 'tool_not_found' : 'tool_execution_error',
        tool: call.name,
        message,
        ...(error instanceof ToolExecutionError && error.code !== undefined ? { code: error.code } : {}),
      });
    }
  }
}

/**
 * Fill in `message_id` from the run when the tool declares that argument and
 * the model left it out.
 */
function withRunContext(
  input: Record<string, unknown>,
  descriptor: ToolDescriptor,
  state: AgentState
): Record<string, unknown> {
  const declared = MESSAGE_ID_ARGUMENT in descriptor.inputSchema.properties;
  const provided = input[MESSAGE_ID_ARGUMENT];
  if (!declared || !state.messageId || (typeof provided === 'string' && provided.length > 0)) {
    return input;
  }

  log.warn(`${descriptor.name}: ${MESSAGE_ID_ARGUMENT} missing from model arguments; using the run's message id`);
  return { ...input, [MESSAGE_ID_ARGUMENT]: state.messageId };
}

function errorMessage(call: ToolCallRequest, payload: ToolErrorPayload & { code?: number }): ToolMessage {
  return {
    role: 'tool',
    toolCallId: call.id,
    name: call.name,
    content: JSON.stringify(payload),
    isError: true,
  };
}
