/**
 * Agent Graph Tests
 *
 * Loop mechanics against a scripted provider and in-memory tool servers.
 */

import { describe, it, expect } from 'vitest';
import { AgentGraph } from './agent-graph.js';
import { createInitialState } from './agent-state.js';
import { LoopLimitExceededError, ModelServiceError } from './errors.js';
import { PromptBuilder } from './prompt-builder.js';
import { ReasoningNode } from './reasoning-node.js';
import type { RetryOptions } from './retry.js';
import { ToolNode } from './tool-node.js';
import type { ResolvedToolRegistry, ToolRegistrySource } from './tool-registry.js';
import {
  callTools,
  InMemoryToolServer,
  registryFor,
  reply,
  ScriptedProvider,
  staticRegistrySource,
  toolCall,
} from '../__tests__/test-utils.js';

function buildGraph(
  provider: ScriptedProvider,
  registry: ToolRegistrySource,
  options: { maxIterations?: number; retry?: RetryOptions } = {}
): AgentGraph {
  return new AgentGraph({
    reasoning: new ReasoningNode({
      provider,
      promptBuilder: new PromptBuilder({ promptsDir: '/nonexistent/prompts' }),
      model: 'test-model',
      maxTokens: 512,
      retry: options.retry,
    }),
    tools: new ToolNode(),
    registry,
    maxIterations: options.maxIterations,
  });
}

async function classifierRegistry(): Promise<ResolvedToolRegistry> {
  return registryFor(
    new InMemoryToolServer('classifier', [
      { name: 'classify_email', description: 'Classify an e-mail', handler: () => 'category: invoice' },
    ])
  );
}

describe('AgentGraph', () => {
  it('terminates on an answer without tool calls', async () => {
    const provider = new ScriptedProvider([reply('Nothing to do')]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));

    const result = await graph.invoke(createInitialState('hello'));

    expect(result.response).toBe('Nothing to do');
    expect(result.state.status).toBe('terminated');
    expect(result.state.iteration).toBe(1);
    expect(result.state.messages).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Nothing to do', toolCalls: [] },
    ]);
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
  });

  it('alternates reasoning and tool execution until the model is done', async () => {
    const provider = new ScriptedProvider([
      callTools(toolCall('c1', 'classify_email', { message_id: 'm-1' })),
      reply('Classified as invoice'),
    ]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));

    const result = await graph.invoke(createInitialState('classify m-1'));

    expect(result.state.iteration).toBe(2);
    expect(result.state.messages.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
    expect(result.state.messages[2]).toEqual({
      role: 'tool',
      toolCallId: 'c1',
      name: 'classify_email',
      content: 'category: invoice',
    });
    expect(result.usage).toEqual({ inputTokens: 20, outputTokens: 10, totalTokens: 30 });

    // The second model call sees the tool result.
    expect(provider.calls[1]?.messages).toHaveLength(3);
  });

  it('hands the model the tool list in the system prompt', async () => {
    const provider = new ScriptedProvider([reply('ok')]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));

    await graph.invoke(createInitialState('hello'));

    const params = provider.calls[0];
    expect(params?.tools.map((t) => t.name)).toEqual(['classify_email']);
    expect(params?.system).toContain('[AVAILABLE TOOLS]\n- classify_email: Classify an e-mail\n[END AVAILABLE TOOLS]');
    expect(params?.model).toBe('test-model');
    expect(params?.maxTokens).toBe(512);
  });

  it('aborts with LoopLimitExceededError once the cap is reached', async () => {
    const provider = new ScriptedProvider([
      callTools(toolCall('c1', 'classify_email')),
      callTools(toolCall('c2', 'classify_email')),
      callTools(toolCall('c3', 'classify_email')),
      reply('never reached'),
    ]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()), { maxIterations: 3 });

    const error = await graph.invoke(createInitialState('loop')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoopLimitExceededError);
    expect(error).toMatchObject({ maxIterations: 3, message: 'Agent loop exceeded the limit of 3 reasoning step(s)' });
    expect(provider.calls).toHaveLength(3);
    if (error instanceof LoopLimitExceededError) {
      expect(error.state?.iteration).toBe(3);
      expect(error.state?.messages).toHaveLength(7);
    }
  });

  it('shows the model an orphan-free history without rewriting the stored one', async () => {
    const provider = new ScriptedProvider([reply('done')]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));
    const initial = createInitialState('hello', {
      preamble: [{ role: 'tool', toolCallId: 'stale', name: 'classify_email', content: 'left over' }],
    });

    const result = await graph.invoke(initial);

    expect(provider.calls[0]?.messages).toEqual([{ role: 'user', content: 'hello' }]);
    expect(result.state.messages[0]).toEqual({
      role: 'tool',
      toolCallId: 'stale',
      name: 'classify_email',
      content: 'left over',
    });
  });

  it('fetches the registry once per run', async () => {
    const registry = await classifierRegistry();
    let fetches = 0;
    const source: ToolRegistrySource = {
      getRegistry: async () => {
        fetches++;
        return registry;
      },
    };
    const provider = new ScriptedProvider([
      callTools(toolCall('c1', 'classify_email')),
      callTools(toolCall('c2', 'classify_email')),
      reply('done'),
    ]);

    await buildGraph(provider, source).invoke(createInitialState('hello'));

    expect(fetches).toBe(1);
  });

  it('aborts the run on a model failure', async () => {
    const provider = new ScriptedProvider([new ModelServiceError('rejected', 'bad request', 400)]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));

    await expect(graph.invoke(createInitialState('hello'))).rejects.toMatchObject({
      kind: 'model_service',
      reason: 'rejected',
    });
  });

  it('reports an unexpected provider exception as a malformed response', async () => {
    const provider = new ScriptedProvider([new Error('socket hang up')]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));

    const error = await graph.invoke(createInitialState('hello')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelServiceError);
    expect(error).toMatchObject({ reason: 'malformed_response', message: 'scripted call failed: socket hang up' });
  });

  it('retries a transient model failure when retries are configured', async () => {
    const provider = new ScriptedProvider([new ModelServiceError('rate_limit', 'slow down', 429), reply('done')]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()), {
      retry: { maxRetries: 1, backoffMs: 0 },
    });

    const result = await graph.invoke(createInitialState('hello'));

    expect(result.response).toBe('done');
    expect(provider.calls).toHaveLength(2);
  });

  it('does not retry by default', async () => {
    const provider = new ScriptedProvider([new ModelServiceError('rate_limit', 'slow down', 429), reply('done')]);
    const graph = buildGraph(provider, staticRegistrySource(await classifierRegistry()));

    await expect(graph.invoke(createInitialState('hello'))).rejects.toBeInstanceOf(ModelServiceError);
    expect(provider.calls).toHaveLength(1);
  });
});
