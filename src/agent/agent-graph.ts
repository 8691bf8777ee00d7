/**
 * Agent Graph
 *
 * Two-node loop: REASONING → (route) → EXECUTING_TOOLS → REASONING … until
 * the model answers without tool calls. The number of reasoning steps is
 * capped; a run that would exceed the cap fails with LoopLimitExceededError.
 *
 * The tool registry is fetched once at the start of a run and stays fixed
 * for the rest of it.
 */

import { appendMessages, withStatus } from './agent-state.js';
import { LoopLimitExceededError } from './errors.js';
import type { ReasoningNode } from './reasoning-node.js';
import { routeAfterReasoning } from './routing.js';
import type { ToolNode } from './tool-node.js';
import type { ToolRegistrySource } from './tool-registry.js';
import { createLogger } from '../logging/logger.js';
import type { AgentRunResult, AgentState, AgentUsageStats } from '../types/agent-types.js';

const log = createLogger('AgentGraph');

export const DEFAULT_MAX_ITERATIONS = 10;

export interface AgentGraphConfig {
  reasoning: ReasoningNode;
  tools: ToolNode;
  registry: ToolRegistrySource;
  /** Maximum reasoning steps per run */
  maxIterations?: number;
}

export class AgentGraph {
  private reasoning: ReasoningNode;
  private tools: ToolNode;
  private registry: ToolRegistrySource;
  readonly maxIterations: number;

  constructor(config: AgentGraphConfig) {
    this.reasoning = config.reasoning;
    this.tools = config.tools;
    this.registry = config.registry;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  async invoke(initial: AgentState): Promise<AgentRunResult> {
    const registry = await this.registry.getRegistry();
    const usage: AgentUsageStats = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
    let state = withStatus(initial, 'reasoning');

    log.info(`Run started (${state.messages.length} message(s), ${registry.size} tool(s), cap ${this.maxIterations})`);

    while (true) {
      if (state.iteration >= this.maxIterations) {
        log.error(`Loop limit of ${this.maxIterations} reasoning step(s) reached; aborting run`);
        throw new LoopLimitExceededError(this.maxIterations, state);
      }

      // REASONING
      const step = await this.reasoning.run(state, registry);
      state = { ...appendMessages(state, [step.message]), iteration: state.iteration + 1 };

      usage.inputTokens += step.usage.inputTokens;
      usage.outputTokens += step.usage.outputTokens;
      usage.totalTokens = usage.inputTokens + usage.outputTokens;

      // ROUTING
      if (routeAfterReasoning(state) === 'end') {
        state = withStatus(state, 'terminated');
        log.info(`Run terminated after ${state.iteration} reasoning step(s), ${state.messages.length} message(s)`);
        return { state, response: step.message.content, usage };
      }

      // EXECUTING_TOOLS
      state = withStatus(state, 'executing_tools');
      const results = await this.tools.run(state, registry);
      state = withStatus(appendMessages(state, results), 'reasoning');
    }
  }
}
