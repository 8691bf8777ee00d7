/**
 * Agent Scenario Tests
 *
 * Whole runs through the service: scripted model, in-memory tool servers.
 */

import { describe, it, expect } from 'vitest';
import { createInitialState } from '../agent/agent-state.js';
import { LoopLimitExceededError } from '../agent/errors.js';
import { handleNotification } from '../handler/webhook-handler.js';
import { createInboxAgent } from '../service/inbox-agent-service.js';
import {
  callTools,
  configFor,
  InMemoryToolServer,
  reply,
  ScriptedProvider,
  testConfig,
  toolCall,
  transportLookup,
} from './test-utils.js';

function agentWith(provider: ScriptedProvider, servers: InMemoryToolServer[], maxIterations = 10) {
  return createInboxAgent(testConfig({ mcpServers: configFor(servers), maxIterations }), {
    provider,
    transport: { transportFactory: transportLookup(servers) },
  });
}

describe('Agent scenarios', () => {
  it('classifies an e-mail in one tool round and stops with four messages', async () => {
    const classifierServer = new InMemoryToolServer('classifier-server', [
      { name: 'classifier', handler: () => JSON.stringify({ label: 'invoice' }) },
    ]);
    const provider = new ScriptedProvider([
      callTools(toolCall('call-1', 'classifier', { id: 12345 })),
      reply('E-mail #12345 is an invoice and was routed to accounting.'),
    ]);
    const agent = agentWith(provider, [classifierServer]);

    const result = await agent.graph.invoke(createInitialState('Classify and route email #12345'));

    expect(result.state.status).toBe('terminated');
    expect(result.state.messages).toEqual([
      { role: 'user', content: 'Classify and route email #12345' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'call-1', name: 'classifier', input: { id: 12345 } }] },
      { role: 'tool', toolCallId: 'call-1', name: 'classifier', content: '{"label":"invoice"}' },
      { role: 'assistant', content: 'E-mail #12345 is an invoice and was routed to accounting.', toolCalls: [] },
    ]);
    expect(classifierServer.invocations).toEqual([{ name: 'classifier', args: { id: 12345 } }]);
  });

  it('runs with the tools of the reachable server when another is down', async () => {
    const down = new InMemoryToolServer('archiver', [{ name: 'archive_email' }]);
    down.unreachable = true;
    const up = new InMemoryToolServer('classifier', [{ name: 'classify_email', handler: () => 'invoice' }]);
    const provider = new ScriptedProvider([callTools(toolCall('c1', 'classify_email')), reply('done')]);
    const agent = agentWith(provider, [down, up]);

    const result = await agent.graph.invoke(createInitialState('new mail'));

    expect(result.response).toBe('done');
    expect(provider.calls[0]?.tools.map((t) => t.name)).toEqual(['classify_email']);
  });

  it('feeds a tool-not-found payload back to the model and keeps reasoning', async () => {
    const server = new InMemoryToolServer('classifier', [{ name: 'classify_email', handler: () => 'invoice' }]);
    const provider = new ScriptedProvider([
      callTools(toolCall('c1', 'forward_to_ceo')),
      (params) => {
        const last = params.messages[params.messages.length - 1];
        return last?.role === 'tool' && last.isError === true
          ? callTools(toolCall('c2', 'classify_email'))
          : reply('unexpected');
      },
      reply('Classified after recovering'),
    ]);
    const agent = agentWith(provider, [server]);

    const result = await agent.graph.invoke(createInitialState('new mail'));

    expect(result.response).toBe('Classified after recovering');
    expect(result.state.iteration).toBe(3);
    const notFound = result.state.messages[2];
    expect(notFound?.role).toBe('tool');
    expect(notFound?.role === 'tool' ? JSON.parse(notFound.content) : null).toEqual({
      error: 'tool_not_found',
      tool: 'forward_to_ceo',
      message: "Tool 'forward_to_ceo' is not registered on any tool server",
      availableTools: ['classify_email'],
    });
    expect(server.invocations.map((i) => i.name)).toEqual(['classify_email']);
  });

  it('stops a model that asks for a tool on every turn', async () => {
    const server = new InMemoryToolServer('classifier', [{ name: 'classify_email' }]);
    const provider = new ScriptedProvider(
      Array.from({ length: 20 }, (_, i) => callTools(toolCall(`c${i}`, 'classify_email')))
    );
    const agent = agentWith(provider, [server], 4);

    await expect(agent.graph.invoke(createInitialState('new mail'))).rejects.toBeInstanceOf(LoopLimitExceededError);
    expect(provider.calls).toHaveLength(4);
    expect(server.invocations).toHaveLength(4);
  });

  it('processes a change notification end to end', async () => {
    const server = new InMemoryToolServer('classifier', [
      {
        name: 'process_email',
        inputSchema: { type: 'object', properties: { message_id: { type: 'string' } }, required: ['message_id'] },
        handler: (args) => `processed ${String(args.message_id)}`,
      },
    ]);
    const provider = new ScriptedProvider([
      (params) => {
        const first = params.messages[0];
        const mentionsId = first?.role === 'user' && first.content.includes("'AAMkAD-42'");
        return mentionsId ? callTools(toolCall('c1', 'process_email', {})) : reply('no id in prompt');
      },
      reply('Processed AAMkAD-42'),
    ]);
    const agent = agentWith(provider, [server]);

    const response = await handleNotification(
      { body: JSON.stringify({ value: [{ resource: "Users('u-1')/Messages('AAMkAD-42')" }] }) },
      { agent }
    );

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      message: 'Orchestration completed for message_id: AAMkAD-42',
      messageId: 'AAMkAD-42',
      finalResponse: 'Processed AAMkAD-42',
      iterations: 2,
    });
    expect(server.invocations).toEqual([{ name: 'process_email', args: { message_id: 'AAMkAD-42' } }]);
  });
});
