/**
 * Server Module
 *
 * Exports for the webhook HTTP server.
 */

export { createWebhookServer, stopOnSignal } from './webhook-server.js';
export type { WebhookServerConfig, WebhookServer } from './webhook-server.js';
