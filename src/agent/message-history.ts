/**
 * Message History
 *
 * Helpers over the ordered message list. The orphan filter is applied only to
 * the view sent to the model; stored history is never rewritten.
 */

import type { AgentMessage, AssistantMessage, ToolCallRequest } from '../types/agent-types.js';

/**
 * Drop every tool message whose toolCallId was not requested by an earlier
 * assistant message. Non-tool messages are always kept, so applying the
 * filter twice gives the same result as applying it once.
 */
export function filterOrphanToolResults(messages: readonly AgentMessage[]): AgentMessage[] {
  const requested = new Set<string>();
  const filtered: AgentMessage[] = [];

  for (const message of messages) {
    if (message.role === 'assistant') {
      for (const call of message.toolCalls) requested.add(call.id);
      filtered.push(message);
    } else if (message.role === 'tool') {
      if (requested.has(message.toolCallId)) filtered.push(message);
    } else {
      filtered.push(message);
    }
  }

  return filtered;
}

export function lastMessage(messages: readonly AgentMessage[]): AgentMessage | undefined {
  return messages[messages.length - 1];
}

/** Tool calls carried by the latest message, or an empty list. */
export function pendingToolCalls(messages: readonly AgentMessage[]): ToolCallRequest[] {
  const last = lastMessage(messages);
  return isAssistantMessage(last) ? last.toolCalls : [];
}

export function isAssistantMessage(message: AgentMessage | undefined): message is AssistantMessage {
  return message?.role === 'assistant';
}
