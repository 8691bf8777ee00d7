/**
 * Inbox Agent Service
 *
 * Single entry point wiring the agent components from configuration:
 * - Model provider (Anthropic, OpenAI-compatible, Azure OpenAI)
 * - Prompt templates
 * - Tool registry over the configured tool servers
 * - Reasoning and tool execution nodes
 * - The loop that drives them
 */

import { AgentGraph } from '../agent/agent-graph.js';
import { createInitialState } from '../agent/agent-state.js';
import type { LLMProvider } from '../agent/llm-provider.js';
import { PromptBuilder } from '../agent/prompt-builder.js';
import { createProvider } from '../agent/providers/provider-factory.js';
import { ReasoningNode } from '../agent/reasoning-node.js';
import { NO_RETRY } from '../agent/retry.js';
import { ToolNode } from '../agent/tool-node.js';
import { ToolRegistryClient } from '../agent/tool-registry.js';
import type { ToolRegistryOptions, ToolRegistrySource } from '../agent/tool-registry.js';
import type { InboxAgentConfig } from '../config/index.js';
import { createLogger } from '../logging/logger.js';
import type { AgentRunResult } from '../types/agent-types.js';

const log = createLogger('InboxAgent');

/**
 * Replacements for the parts that talk to the outside world
 */
export interface InboxAgentOverrides {
  provider?: LLMProvider;
  registry?: ToolRegistrySource;
  /** Transport settings for the default registry */
  transport?: Omit<ToolRegistryOptions, 'awsRegion'>;
}

export class InboxAgentService {
  readonly graph: AgentGraph;
  readonly promptBuilder: PromptBuilder;
  readonly registry: ToolRegistrySource;
  readonly provider: LLMProvider;

  constructor(graph: AgentGraph, promptBuilder: PromptBuilder, registry: ToolRegistrySource, provider: LLMProvider) {
    this.graph = graph;
    this.promptBuilder = promptBuilder;
    this.registry = registry;
    this.provider = provider;
  }

  /**
   * Run the loop for one new e-mail
   */
  async processNotification(messageId: string, notification?: unknown): Promise<AgentRunResult> {
    log.info(`Processing notification for message ${messageId}`);
    const prompt = this.promptBuilder.buildNotificationPrompt(messageId);
    const initial = createInitialState(prompt, { messageId, notification });
    return this.graph.invoke(initial);
  }

  /** Names of the tools the next run would see */
  async listTools(): Promise<string[]> {
    const registry = await this.registry.getRegistry();
    return registry.names();
  }
}

/**
 * Create the agent from configuration
 */
export function createInboxAgent(config: InboxAgentConfig, overrides: InboxAgentOverrides = {}): InboxAgentService {
  const provider =
    overrides.provider ??
    createProvider({
      type: config.llm.provider,
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      azureDeployment: config.llm.azureDeployment,
      azureApiVersion: config.llm.azureApiVersion,
      timeoutMs: config.llm.timeoutMs,
    });

  const registry =
    overrides.registry ??
    new ToolRegistryClient(config.mcpServers, {
      ...overrides.transport,
      refresh: config.toolRefresh,
      listTimeoutMs: config.toolTimeoutMs,
      awsRegion: config.awsRegion,
    });

  const promptBuilder = new PromptBuilder({ promptsDir: config.promptsDir });

  const reasoning = new ReasoningNode({
    provider,
    promptBuilder,
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    retry: { ...NO_RETRY, maxRetries: config.llm.retries },
  });

  const tools = new ToolNode({
    concurrency: config.toolConcurrency,
    timeoutMs: config.toolTimeoutMs,
  });

  const graph = new AgentGraph({
    reasoning,
    tools,
    registry,
    maxIterations: config.maxIterations,
  });

  log.info(`Agent ready: ${provider.name} (${config.llm.model}), ${Object.keys(config.mcpServers).length} tool server(s)`);

  return new InboxAgentService(graph, promptBuilder, registry, provider);
}
