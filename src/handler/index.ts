export { extractMessageId, handleNotification, NotificationParseError, parseNotification } from './webhook-handler.js';
export type {
  NotificationFailureBody,
  NotificationSuccessBody,
  WebhookEvent,
  WebhookHandlerDeps,
  WebhookResponse,
} from './webhook-handler.js';
export { handler } from './lambda.js';
