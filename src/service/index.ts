/**
 * Service Module
 *
 * Exports for the inbox agent service.
 */

export { createInboxAgent, InboxAgentService } from './inbox-agent-service.js';
export type { InboxAgentOverrides } from './inbox-agent-service.js';
