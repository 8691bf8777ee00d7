import { isAssistantMessage, lastMessage } from './message-history.js';
import type { AgentState } from '../types/agent-types.js';

export type Route = 'tools' | 'end';

/** Sole branch point of the loop: tools iff the latest message asked for any. */
export function routeAfterReasoning(state: Pick<AgentState, 'messages'>): Route {
  const last = lastMessage(state.messages);
  return isAssistantMessage(last) && last.toolCalls.length > 0 ? 'tools' : 'end';
}
