/**
 * Inbox Agent
 *
 * Serverless e-mail orchestration:
 * - Change notification in, one agent run per new message
 * - Reasoning → tool execution loop with a bounded number of steps
 * - Tools discovered at run time from JSON-RPC tool servers (HTTP or Lambda)
 *
 * @module inbox-agent
 */

// Core types
export * from './types/index.js';

// Agent
export * from './agent/index.js';

// Tool servers
export * from './mcp/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, validateConfig, parseServers } from './config/index.js';
export type { InboxAgentConfig } from './config/index.js';

// Logging
export { createLogger, setLogLevel, getLogLevel } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';

// Service
export { createInboxAgent, InboxAgentService } from './service/index.js';
export type { InboxAgentOverrides } from './service/index.js';

// Entry points
export { handleNotification, parseNotification, extractMessageId, handler } from './handler/index.js';
export type { WebhookEvent, WebhookResponse, WebhookHandlerDeps } from './handler/index.js';
export { createWebhookServer } from './server/index.js';
export type { WebhookServer, WebhookServerConfig } from './server/index.js';
