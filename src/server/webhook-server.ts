/**
 * Webhook Server
 *
 * HTTP front for the agent when it runs as a long-lived process rather than
 * a serverless function. The body is taken as raw text and handed to the
 * same handler the serverless entry point uses.
 */

import express from 'express';
import type { Application, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { toRunFailure } from '../agent/errors.js';
import { handleNotification } from '../handler/webhook-handler.js';
import { createLogger } from '../logging/logger.js';
import type { InboxAgentService } from '../service/inbox-agent-service.js';

const log = createLogger('Server');

/**
 * Server configuration
 */
export interface WebhookServerConfig {
  agent: Pick<InboxAgentService, 'processNotification' | 'listTools'>;
  /** 0 picks a free port */
  port?: number;
  /** Largest accepted request body */
  bodyLimit?: string;
}

export interface WebhookServer {
  app: Application;
  /** Resolves with the port actually bound */
  start(): Promise<number>;
  stop(): Promise<void>;
}

export function createWebhookServer(config: WebhookServerConfig): WebhookServer {
  const app = express();
  const port = config.port ?? 3000;

  app.use(express.text({ type: '*/*', limit: config.bodyLimit ?? '1mb' }));

  // =========================================================================
  // Notifications
  // =========================================================================

  app.post('/webhook', async (req: Request, res: Response) => {
    const body = typeof req.body === 'string' ? req.body : null;
    const result = await handleNotification({ body }, { agent: config.agent });
    res.status(result.statusCode).type('application/json').send(result.body);
  });

  // =========================================================================
  // Health
  // =========================================================================

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const tools = await config.agent.listTools();
      res.json({ status: 'ok', tools });
    } catch (error) {
      res.status(503).json({ status: 'unavailable', error: toRunFailure(error) });
    }
  });

  // =========================================================================
  // Error Handling
  // =========================================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    log.error('Server error:', err);
    res.status(500).json({ error: { kind: 'internal', message: err.message } });
  });

  // =========================================================================
  // Server Lifecycle
  // =========================================================================

  let server: Server | null = null;

  return {
    app,

    async start() {
      return new Promise<number>((resolve, reject) => {
        const listening = app.listen(port, (error?: Error) => {
          if (error) {
            reject(error);
            return;
          }
          const address = listening.address();
          const bound = typeof address === 'object' && address !== null ? address.port : port;
          log.info(`Listening on port ${bound}`);
          resolve(bound);
        });
        server = listening;
      });
    },

    async stop() {
      const current = server;
      if (!current) return;
      server = null;
      return new Promise<void>((resolve, reject) => {
        current.close((error?: Error) => {
          if (error) {
            reject(error);
            return;
          }
          log.info('Server stopped');
          resolve();
        });
      });
    },
  };
}

/**
 * Signal handler that stops the server and exits, with code 1 when the
 * server fails to close.
 */
export function stopOnSignal(
  server: Pick<WebhookServer, 'stop'>,
  exit: (code: number) => void = (code) => process.exit(code)
): (signal: string) => Promise<void> {
  return async (signal) => {
    log.info(`Received ${signal}, shutting down...`);
    try {
      await server.stop();
    } catch (error) {
      log.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      exit(1);
      return;
    }
    exit(0);
  };
}
