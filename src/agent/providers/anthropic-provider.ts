/**
 * Anthropic LLM Provider
 *
 * Implements LLMProvider using the @anthropic-ai/sdk.
 * Converts AgentMessage ↔ Anthropic native format at the boundary.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ModelServiceError } from '../errors.js';
import type { LLMChatParams, LLMProvider, LLMResponse } from '../llm-provider.js';
import type { AgentMessage, ToolCallRequest } from '../../types/agent-types.js';
import { parseToolArguments, reasonForStatus } from './shared.js';

/** The part of the SDK client the provider calls */
export interface AnthropicMessagesApi {
  create(body: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
}

export interface AnthropicProviderConfig {
  apiKey: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Replaces the SDK's messages resource (tests, proxies) */
  messagesApi?: AnthropicMessagesApi;
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private messagesApi: AnthropicMessagesApi;

  constructor(config: AnthropicProviderConfig) {
    // Retries belong to the reasoning node's policy, not the SDK.
    this.messagesApi =
      config.messagesApi ??
      new Anthropic({ apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs }).messages;
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const { system, messages } = this.toAnthropicMessages(params.system, params.messages);

    const tools: Anthropic.Tool[] = params.tools.map((t) => ({
      name: t.name,
      description: t.description,
      input_schema: t.input_schema,
    }));

    let response: Anthropic.Message;
    try {
      response = await this.messagesApi.create({
        model: params.model,
        max_tokens: params.maxTokens,
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        system,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
      });
    } catch (error) {
      throw toModelServiceError(error);
    }

    const text = response.content
      .filter((b): b is Anthropic.TextBlock => b.type === 'text')
      .map((b) => b.text)
      .join('');

    const toolCalls: ToolCallRequest[] = response.content
      .filter((b): b is Anthropic.ToolUseBlock => b.type === 'tool_use')
      .map((b) => ({
        id: b.id,
        name: b.name,
        input: parseToolArguments('Anthropic', b.name, b.input),
      }));

    return {
      text,
      toolCalls,
      stopReason: response.stop_reason ?? 'unknown',
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  /**
   * System messages are folded into the system prompt; consecutive tool
   * messages become one user turn of tool_result blocks.
   */
  private toAnthropicMessages(
    basePrompt: string,
    history: AgentMessage[]
  ): { system: string; messages: Anthropic.MessageParam[] } {
    const systemParts = [basePrompt];
    const messages: Anthropic.MessageParam[] = [];
    let pendingResults: Anthropic.ToolResultBlockParam[] = [];

    const flushResults = () => {
      if (pendingResults.length === 0) return;
      messages.push({ role: 'user', content: pendingResults });
      pendingResults = [];
    };

    for (const msg of history) {
      if (msg.role === 'tool') {
        pendingResults.push({
          type: 'tool_result',
          tool_use_id: msg.toolCallId,
          content: msg.content,
          ...(msg.isError ? { is_error: true } : {}),
        });
        continue;
      }

      flushResults();

      if (msg.role === 'system') {
        systemParts.push(msg.content);
      } else if (msg.role === 'user') {
        messages.push({ role: 'user', content: msg.content });
      } else if (msg.toolCalls.length === 0) {
        messages.push({ role: 'assistant', content: msg.content });
      } else {
        const blocks: Anthropic.ContentBlockParam[] = [];
        if (msg.content) blocks.push({ type: 'text', text: msg.content });
        for (const call of msg.toolCalls) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input });
        }
        messages.push({ role: 'assistant', content: blocks });
      }
    }
    flushResults();

    return { system: systemParts.filter((p) => p.length > 0).join('\n\n'), messages };
  }
}

function toModelServiceError(error: unknown): ModelServiceError {
  if (error instanceof ModelServiceError) return error;

  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelServiceError('timeout', `Anthropic request timed out: ${error.message}`, undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ModelServiceError('unavailable', `Anthropic API unreachable: ${error.message}`, undefined, { cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    const status = error.status ?? 0;
    return new ModelServiceError(
      status === 0 ? 'unavailable' : reasonForStatus(status),
      `Anthropic API error (${status}): ${error.message}`,
      status || undefined,
      { cause: error }
    );
  }
  return new ModelServiceError(
    'malformed_response',
    `Anthropic call failed: ${error instanceof Error ? error.message : String(error)}`,
    undefined,
    { cause: error }
  );
}
