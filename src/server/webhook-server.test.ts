/**
 * Webhook Server Tests
 *
 * Runs the express app on an ephemeral local port.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createWebhookServer, stopOnSignal } from './webhook-server.js';
import type { WebhookServer } from './webhook-server.js';
import { NoToolsAvailableError } from '../agent/errors.js';
import type { AgentRunResult } from '../types/agent-types.js';

const done: AgentRunResult = {
  state: { messages: [], iteration: 1, status: 'terminated' },
  response: 'Filed under receipts',
  usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
};

describe('createWebhookServer', () => {
  let server: WebhookServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  async function startWith(agent: Parameters<typeof createWebhookServer>[0]['agent']): Promise<string> {
    server = createWebhookServer({ agent, port: 0 });
    const port = await server.start();
    return `http://127.0.0.1:${port}`;
  }

  it('hands POST /webhook bodies to the notification handler', async () => {
    const processNotification = vi.fn().mockResolvedValue(done);
    const base = await startWith({ processNotification, listTools: vi.fn().mockResolvedValue([]) });

    const res = await fetch(`${base}/webhook`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ value: [{ resource: "Users('u-1')/Messages('m-3')" }] }),
    });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('application/json');
    expect(await res.json()).toEqual({
      message: 'Orchestration completed for message_id: m-3',
      messageId: 'm-3',
      finalResponse: 'Filed under receipts',
      iterations: 1,
    });
    expect(processNotification).toHaveBeenCalledWith('m-3', { resource: "Users('u-1')/Messages('m-3')" });
  });

  it('answers 400 for a body that is not JSON', async () => {
    const base = await startWith({ processNotification: vi.fn(), listTools: vi.fn().mockResolvedValue([]) });

    const res = await fetch(`${base}/webhook`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'hello',
    });

    expect(res.status).toBe(400);
  });

  it('reports the resolved tools on GET /health', async () => {
    const base = await startWith({
      processNotification: vi.fn(),
      listTools: vi.fn().mockResolvedValue(['classify_email', 'archive_email']),
    });

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', tools: ['classify_email', 'archive_email'] });
  });

  it('answers 503 on GET /health when no tools resolve', async () => {
    const base = await startWith({
      processNotification: vi.fn(),
      listTools: vi.fn().mockRejectedValue(new NoToolsAvailableError(['classifier'])),
    });

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      status: 'unavailable',
      error: {
        kind: 'no_tools_available',
        message: 'No tools could be loaded from any configured server (classifier)',
      },
    });
  });
});

describe('stopOnSignal', () => {
  it('exits with 0 once the server has stopped', async () => {
    const stop = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    const exit = vi.fn<(code: number) => void>();

    await stopOnSignal({ stop }, exit)('SIGTERM');

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits with 1 when the server fails to close', async () => {
    const stop = vi.fn<() => Promise<void>>().mockRejectedValue(new Error('close failed'));
    const exit = vi.fn<(code: number) => void>();

    await expect(stopOnSignal({ stop }, exit)('SIGINT')).resolves.toBeUndefined();

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
