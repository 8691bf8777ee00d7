/**
 * Tool Execution Node Tests
 */

import { describe, it, expect } from 'vitest';
import { ToolNode } from './tool-node.js';
import { appendMessages, createInitialState } from './agent-state.js';
import type { AgentState, ToolCallRequest } from '../types/agent-types.js';
import { delay, InMemoryToolServer, registryFor, toolCall } from '../__tests__/test-utils.js';

function stateWithCalls(calls: ToolCallRequest[], messageId?: string): AgentState {
  const initial = createInitialState('process the e-mail', { messageId });
  return appendMessages(initial, [{ role: 'assistant', content: '', toolCalls: calls }]);
}

const messageIdSchema = {
  type: 'object' as const,
  properties: { message_id: { type: 'string' } },
  required: ['message_id'],
};

describe('ToolNode', () => {
  it('answers every call with one tool message in request order', async () => {
    const server = new InMemoryToolServer('mail', [
      { name: 'classify_email', handler: () => 'invoice' },
      { name: 'archive_email', handler: () => 'archived' },
    ]);
    const registry = await registryFor(server);

    const results = await new ToolNode().run(
      stateWithCalls([toolCall('c1', 'classify_email'), toolCall('c2', 'archive_email')]),
      registry
    );

    expect(results).toEqual([
      { role: 'tool', toolCallId: 'c1', name: 'classify_email', content: 'invoice' },
      { role: 'tool', toolCallId: 'c2', name: 'archive_email', content: 'archived' },
    ]);
  });

  it('keeps request order when parallel calls settle out of order', async () => {
    const settled: string[] = [];
    const server = new InMemoryToolServer('mail', [
      {
        name: 'slow',
        handler: async () => {
          await delay(30);
          settled.push('slow');
          return 'slow result';
        },
      },
      {
        name: 'fast',
        handler: () => {
          settled.push('fast');
          return 'fast result';
        },
      },
    ]);
    const registry = await registryFor(server);

    const results = await new ToolNode({ concurrency: 'parallel' }).run(
      stateWithCalls([toolCall('c1', 'slow'), toolCall('c2', 'fast')]),
      registry
    );

    expect(settled).toEqual(['fast', 'slow']);
    expect(results.map((r) => r.toolCallId)).toEqual(['c1', 'c2']);
    expect(results.map((r) => r.content)).toEqual(['slow result', 'fast result']);
  });

  it('reports an unknown tool to the model and carries on with the other calls', async () => {
    const server = new InMemoryToolServer('mail', [{ name: 'classify_email', handler: () => 'invoice' }]);
    const registry = await registryFor(server);

    const results = await new ToolNode().run(
      stateWithCalls([toolCall('c1', 'ghost_tool'), toolCall('c2', 'classify_email')]),
      registry
    );

    expect(results[0]).toEqual({
      role: 'tool',
      toolCallId: 'c1',
      name: 'ghost_tool',
      content: JSON.stringify({
        error: 'tool_not_found',
        tool: 'ghost_tool',
        message: "Tool 'ghost_tool' is not registered on any tool server",
        availableTools: ['classify_email'],
      }),
      isError: true,
    });
    expect(results[1]).toEqual({ role: 'tool', toolCallId: 'c2', name: 'classify_email', content: 'invoice' });
  });

  it('turns a failed invocation into an error payload', async () => {
    const server = new InMemoryToolServer('mail', [
      {
        name: 'classify_email',
        handler: () => {
          throw new Error('mailbox locked');
        },
      },
    ]);
    const registry = await registryFor(server);

    const [result] = await new ToolNode().run(stateWithCalls([toolCall('c1', 'classify_email')]), registry);

    expect(result).toEqual({
      role: 'tool',
      toolCallId: 'c1',
      name: 'classify_email',
      content: JSON.stringify({
        error: 'tool_execution_error',
        tool: 'classify_email',
        message: 'Error (-32000): mailbox locked',
        code: -32000,
      }),
      isError: true,
    });
  });

  it('passes through a result the server flagged as an error', async () => {
    const server = new InMemoryToolServer('mail', [
      { name: 'classify_email', handler: () => ({ text: 'message not found', isError: true }) },
    ]);
    const registry = await registryFor(server);

    const [result] = await new ToolNode().run(stateWithCalls([toolCall('c1', 'classify_email')]), registry);

    expect(result).toEqual({
      role: 'tool',
      toolCallId: 'c1',
      name: 'classify_email',
      content: 'message not found',
      isError: true,
    });
  });

  it('times out a call that takes too long', async () => {
    const server = new InMemoryToolServer('mail', [
      {
        name: 'slow_tool',
        handler: async (_args, signal) => {
          await delay(5_000, signal);
          return 'too late';
        },
      },
    ]);
    const registry = await registryFor(server);

    const [result] = await new ToolNode({ timeoutMs: 20 }).run(stateWithCalls([toolCall('c1', 'slow_tool')]), registry);

    expect(result?.isError).toBe(true);
    expect(JSON.parse(result?.content ?? '{}')).toEqual({
      error: 'tool_execution_error',
      tool: 'slow_tool',
      message: "Tool 'slow_tool' timed out after 20ms",
      code: -32000,
    });
  });

  it("fills in message_id from the run when the tool declares it and the model left it out", async () => {
    const server = new InMemoryToolServer('mail', [{ name: 'classify_email', inputSchema: messageIdSchema }]);
    const registry = await registryFor(server);

    await new ToolNode().run(stateWithCalls([toolCall('c1', 'classify_email', { priority: 'high' })], 'AAMk-1'), registry);

    expect(server.invocations).toEqual([{ name: 'classify_email', args: { priority: 'high', message_id: 'AAMk-1' } }]);
  });

  it('leaves a message_id the model supplied untouched', async () => {
    const server = new InMemoryToolServer('mail', [{ name: 'classify_email', inputSchema: messageIdSchema }]);
    const registry = await registryFor(server);

    await new ToolNode().run(
      stateWithCalls([toolCall('c1', 'classify_email', { message_id: 'from-model' })], 'AAMk-1'),
      registry
    );

    expect(server.invocations[0]?.args).toEqual({ message_id: 'from-model' });
  });

  it('does not add message_id to tools that do not declare it', async () => {
    const server = new InMemoryToolServer('mail', [{ name: 'summarize' }]);
    const registry = await registryFor(server);

    await new ToolNode().run(stateWithCalls([toolCall('c1', 'summarize')], 'AAMk-1'), registry);

    expect(server.invocations[0]?.args).toEqual({});
  });

  it('returns nothing when the latest message has no tool calls', async () => {
    const registry = await registryFor(new InMemoryToolServer('mail', [{ name: 'classify_email' }]));

    await expect(new ToolNode().run(stateWithCalls([]), registry)).resolves.toEqual([]);
  });
});
