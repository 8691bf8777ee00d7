/**
 * Agent State
 *
 * Construction and transitions of the per-run state. Every transition returns
 * a new object; the message list only ever grows.
 */

import type { AgentMessage, AgentState, AgentStatus } from '../types/agent-types.js';

export interface InitialStateOptions {
  messageId?: string;
  notification?: unknown;
  /** Messages placed before the user prompt, e.g. per-run system context */
  preamble?: AgentMessage[];
}

export function createInitialState(prompt: string, options: InitialStateOptions = {}): AgentState {
  return {
    messages: [...(options.preamble ?? []), { role: 'user', content: prompt }],
    iteration: 0,
    status: 'reasoning',
    messageId: options.messageId,
    notification: options.notification,
  };
}

export function appendMessages(state: AgentState, messages: AgentMessage[]): AgentState {
  return { ...state, messages: [...state.messages, ...messages] };
}

export function withStatus(state: AgentState, status: AgentStatus): AgentState {
  return { ...state, status };
}
