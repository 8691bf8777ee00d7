/**
 * Inbox Agent Core Types
 */

export * from './agent-types.js';
