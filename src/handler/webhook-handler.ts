/**
 * Webhook Handler
 *
 * Turns a mailbox change notification into one agent run. The event has the
 * shape of an API Gateway proxy request; only `body` is read. The body is a
 * change notification `{ value: [{ resource, ... }] }` whose resource path
 * names the new message.
 */

import { toRunFailure } from '../agent/errors.js';
import type { RunFailure } from '../agent/errors.js';
import { isRecord } from '../agent/providers/shared.js';
import { createLogger, preview } from '../logging/logger.js';
import type { InboxAgentService } from '../service/inbox-agent-service.js';

const log = createLogger('Webhook');

export interface WebhookEvent {
  body?: string | null;
}

export interface WebhookResponse {
  statusCode: number;
  body: string;
}

export interface WebhookHandlerDeps {
  agent: Pick<InboxAgentService, 'processNotification'>;
}

export interface NotificationSuccessBody {
  message: string;
  messageId: string;
  finalResponse: string;
  iterations: number;
}

export interface NotificationFailureBody {
  error: RunFailure;
}

const MESSAGE_ID_PATTERNS = [/messages\('([^']+)'\)/i, /\/messages\/([^/?#]+)/i];

export class NotificationParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotificationParseError';
  }
}

/**
 * Extract the message id and the notification entry it came from
 */
export function parseNotification(body: string | null | undefined): { messageId: string; notification: unknown } {
  let json: unknown;
  try {
    json = JSON.parse(body ?? '{}');
  } catch (error) {
    throw new NotificationParseError(`Body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const notification = firstNotification(json);
  const resource = isRecord(notification) && typeof notification.resource === 'string' ? notification.resource : '';
  const messageId = extractMessageId(resource);
  if (!messageId) {
    throw new NotificationParseError(`Could not extract a message id from resource '${resource}'`);
  }
  return { messageId, notification };
}

export function extractMessageId(resource: string): string | null {
  for (const pattern of MESSAGE_ID_PATTERNS) {
    const match = pattern.exec(resource);
    if (match?.[1]) return match[1];
  }
  return null;
}

export async function handleNotification(event: WebhookEvent, deps: WebhookHandlerDeps): Promise<WebhookResponse> {
  log.debug(`Event received: ${preview(event.body ?? '', 500)}`);

  let parsed: { messageId: string; notification: unknown };
  try {
    parsed = parseNotification(event.body);
  } catch (error) {
    const message = `Could not process the change notification: ${error instanceof Error ? error.message : String(error)}`;
    log.warn(message);
    return respond(400, { error: message });
  }

  const { messageId, notification } = parsed;
  log.info(`Message id: ${messageId}`);

  try {
    const result = await deps.agent.processNotification(messageId, notification);
    const body: NotificationSuccessBody = {
      message: `Orchestration completed for message_id: ${messageId}`,
      messageId,
      finalResponse: result.response,
      iterations: result.state.iteration,
    };
    return respond(200, body);
  } catch (error) {
    const failure = toRunFailure(error);
    log.error(`Run for ${messageId} failed (${failure.kind}): ${failure.message}`);
    const body: NotificationFailureBody = { error: failure };
    return respond(500, body);
  }
}

function respond(statusCode: number, body: unknown): WebhookResponse {
  return { statusCode, body: JSON.stringify(body) };
}

function firstNotification(json: unknown): unknown {
  if (!isRecord(json) || !Array.isArray(json.value)) return undefined;
  return json.value[0];
}
