/**
 * Reasoning Node
 *
 * One model call per step. The model sees an orphan-free view of the history
 * plus the resolved tool capabilities and answers with exactly one assistant
 * message. The node never touches the stored history itself.
 */

import { ModelServiceError } from './errors.js';
import type { LLMProvider } from './llm-provider.js';
import { filterOrphanToolResults } from './message-history.js';
import type { PromptBuilder } from './prompt-builder.js';
import { NO_RETRY, withRetry } from './retry.js';
import type { RetryOptions } from './retry.js';
import type { ResolvedToolRegistry } from './tool-registry.js';
import { createLogger } from '../logging/logger.js';
import type { AgentState, AssistantMessage } from '../types/agent-types.js';

const log = createLogger('ReasoningNode');

export interface ReasoningNodeConfig {
  provider: LLMProvider;
  promptBuilder: PromptBuilder;
  model: string;
  maxTokens: number;
  temperature?: number;
  /** Bounded retry for transient model failures; none by default */
  retry?: RetryOptions;
}

export interface ReasoningOutput {
  message: AssistantMessage;
  usage: { inputTokens: number; outputTokens: number };
}

export class ReasoningNode {
  private config: ReasoningNodeConfig;

  constructor(config: ReasoningNodeConfig) {
    this.config = config;
  }

  async run(state: AgentState, registry: ResolvedToolRegistry): Promise<ReasoningOutput> {
    const { provider, promptBuilder, model, maxTokens, temperature } = this.config;

    const messages = filterOrphanToolResults(state.messages);
    const dropped = state.messages.length - messages.length;
    if (dropped > 0) {
      log.warn(`Dropped ${dropped} orphaned tool result(s) from the model view`);
    }

    const tools = registry.definitions();
    const system = promptBuilder.buildSystemPrompt(tools);

    log.debug(`Invoking ${provider.name} (${model}) with ${messages.length} message(s), ${tools.length} tool(s)`);

    const response = await withRetry(
      async () => {
        try {
          return await provider.chat({ model, maxTokens, temperature, system, messages, tools });
        } catch (error) {
          if (error instanceof ModelServiceError) throw error;
          throw new ModelServiceError(
            'malformed_response',
            `${provider.name} call failed: ${error instanceof Error ? error.message : String(error)}`,
            undefined,
            { cause: error }
          );
        }
      },
      this.config.retry ?? NO_RETRY,
      (error, attempt, delayMs) => {
        const message = error instanceof Error ? error.message : String(error);
        log.warn(`Model call failed (${message}); retry ${attempt} in ${Math.round(delayMs)}ms`);
      }
    );

    if (response.toolCalls.length > 0) {
      for (const call of response.toolCalls) {
        if (registry.has(call.name)) {
          log.info(`Model requested tool: ${call.name}`);
        } else {
          log.error(`Model requested unknown tool '${call.name}'; available: ${registry.names().join(', ')}`);
        }
      }
    } else {
      log.info(`Model finished without tool calls (stop: ${response.stopReason})`);
    }

    return {
      message: { role: 'assistant', content: response.text, toolCalls: response.toolCalls },
      usage: response.usage,
    };
  }
}
