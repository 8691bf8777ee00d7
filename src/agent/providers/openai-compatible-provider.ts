/**
 * OpenAI-Compatible LLM Provider
 *
 * Works with Azure OpenAI deployments, OpenAI, Ollama, vLLM, Groq or any
 * endpoint speaking the chat-completions API. Uses raw fetch, no SDK
 * dependency. Converts AgentMessage ↔ OpenAI chat format at the boundary.
 */

import { z } from 'zod';
import { ModelServiceError } from '../errors.js';
import type { LLMChatParams, LLMProvider, LLMResponse } from '../llm-provider.js';
import type { AgentMessage } from '../../types/agent-types.js';
import { isTimeoutError, parseToolArguments, reasonForStatus } from './shared.js';

export interface AzureDeployment {
  deployment: string;
  apiVersion: string;
}

export interface OpenAICompatibleProviderConfig {
  /** Base URL (default: http://localhost:11434); the Azure resource endpoint for Azure */
  baseUrl?: string;
  /** API key (optional; not needed for local Ollama) */
  apiKey?: string;
  /** Set to address an Azure OpenAI deployment instead of /v1/chat/completions */
  azure?: AzureDeployment;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

interface OpenAIChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  tool_calls?: OpenAIToolCall[];
  tool_call_id?: string;
}

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.unknown() }),
              })
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
    })
    .nullish(),
});

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private baseUrl: string;
  private apiKey?: string;
  private azure?: AzureDeployment;
  private timeoutMs?: number;

  constructor(config: OpenAICompatibleProviderConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.azure = config.azure;
    this.timeoutMs = config.timeoutMs;
    this.name = config.azure ? 'azure-openai' : 'openai-compatible';
  }

  get url(): string {
    if (this.azure) {
      return `${this.baseUrl}/openai/deployments/${encodeURIComponent(this.azure.deployment)}/chat/completions?api-version=${encodeURIComponent(this.azure.apiVersion)}`;
    }
    return `${this.baseUrl}/v1/chat/completions`;
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const openaiTools = params.tools.map((t) => ({
      type: 'function' as const,
      function: {
        name: t.name,
        description: t.description,
        parameters: t.input_schema,
      },
    }));

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      if (this.azure) headers['api-key'] = this.apiKey;
      else headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const body: Record<string, unknown> = {
      max_tokens: params.maxTokens,
      messages: this.toOpenAIMessages(params.system, params.messages),
      stream: false,
    };
    // Azure routes by deployment; the model field is ignored there.
    if (!this.azure) body.model = params.model;
    if (params.temperature !== undefined) body.temperature = params.temperature;

    // Only include tools if there are any
    if (openaiTools.length > 0) {
      body.tools = openaiTools;
    }

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (error) {
      const reason = isTimeoutError(error) ? 'timeout' : 'unavailable';
      throw new ModelServiceError(
        reason,
        `${this.name} request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new ModelServiceError(
        reasonForStatus(response.status),
        `${this.name} API error (${response.status}): ${errorText}`,
        response.status
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new ModelServiceError('malformed_response', `${this.name} returned invalid JSON`, undefined, { cause: error });
    }

    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelServiceError('malformed_response', `Unexpected response shape from ${this.name}: ${parsed.error.message}`);
    }

    const data = parsed.data;
    const [choice] = data.choices;
    if (!choice) throw new ModelServiceError('malformed_response', `No choices in response from ${this.name}`);

    const toolCalls = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      input: parseToolArguments(this.name, tc.function.name, tc.function.arguments),
    }));

    return {
      text: choice.message.content ?? '',
      toolCalls,
      stopReason: choice.finish_reason ?? 'unknown',
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }

  /** Convert system prompt + agent messages → OpenAI chat format */
  private toOpenAIMessages(system: string, messages: AgentMessage[]): OpenAIChatMessage[] {
    const result: OpenAIChatMessage[] = [];
    if (system) result.push({ role: 'system', content: system });

    for (const msg of messages) {
      switch (msg.role) {
        case 'system':
        case 'user':
          result.push({ role: msg.role, content: msg.content });
          break;
        case 'tool':
          result.push({ role: 'tool', content: msg.content, tool_call_id: msg.toolCallId });
          break;
        case 'assistant': {
          const oaiMsg: OpenAIChatMessage = { role: 'assistant', content: msg.content || null };
          if (msg.toolCalls.length > 0) {
            oaiMsg.tool_calls = msg.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.input) },
            }));
          }
          result.push(oaiMsg);
          break;
        }
      }
    }

    return result;
  }
}
