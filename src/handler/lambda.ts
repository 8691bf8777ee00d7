/**
 * Serverless entry point
 *
 * The agent is built on the first invocation and reused while the execution
 * environment stays warm, together with its cached tool registry.
 */

import { getConfig, validateConfig } from '../config/index.js';
import { ConfigurationError, toRunFailure } from '../agent/errors.js';
import { createLogger, setLogLevel } from '../logging/logger.js';
import { createInboxAgent } from '../service/inbox-agent-service.js';
import type { InboxAgentService } from '../service/inbox-agent-service.js';
import { handleNotification } from './webhook-handler.js';
import type { WebhookEvent, WebhookResponse } from './webhook-handler.js';

const log = createLogger('Lambda');

let agent: InboxAgentService | null = null;

function getAgent(): InboxAgentService {
  if (!agent) {
    const config = getConfig();
    setLogLevel(config.logLevel);
    const { valid, errors } = validateConfig(config);
    if (!valid) throw new ConfigurationError(errors);
    agent = createInboxAgent(config);
  }
  return agent;
}

export async function handler(event: WebhookEvent): Promise<WebhookResponse> {
  let current: InboxAgentService;
  try {
    current = getAgent();
  } catch (error) {
    log.error('Agent could not be created:', error);
    return { statusCode: 500, body: JSON.stringify({ error: toRunFailure(error) }) };
  }
  return handleNotification(event, { agent: current });
}
