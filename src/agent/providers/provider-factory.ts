/**
 * Provider Factory
 *
 * Creates the LLM provider described by the model section of the
 * configuration. Credentials come from the caller, never from the
 * environment directly.
 */

import { ConfigurationError } from '../errors.js';
import type { LLMProvider } from '../llm-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { OpenAICompatibleProvider } from './openai-compatible-provider.js';

export type ProviderType = 'anthropic' | 'openai-compatible' | 'azure-openai';

export interface ProviderConfig {
  type: ProviderType;
  /** API key for the selected provider */
  apiKey?: string;
  /** Base URL for OpenAI-compatible endpoints, resource endpoint for Azure */
  baseUrl?: string;
  /** Azure deployment name (for type: 'azure-openai') */
  azureDeployment?: string;
  /** Azure API version (for type: 'azure-openai') */
  azureApiVersion?: string;
  timeoutMs?: number;
}

export function createProvider(config: ProviderConfig): LLMProvider {
  switch (config.type) {
    case 'anthropic': {
      if (!config.apiKey) {
        throw new ConfigurationError(['ANTHROPIC_API_KEY is required for the anthropic provider']);
      }
      return new AnthropicProvider({ apiKey: config.apiKey, timeoutMs: config.timeoutMs });
    }

    case 'azure-openai': {
      const issues: string[] = [];
      if (!config.baseUrl) issues.push('AZURE_OPENAI_ENDPOINT is required for the azure-openai provider');
      if (!config.apiKey) issues.push('AZURE_OPENAI_API_KEY is required for the azure-openai provider');
      if (!config.azureDeployment) issues.push('AZURE_OPENAI_DEPLOYMENT_NAME is required for the azure-openai provider');
      if (!config.baseUrl || !config.apiKey || !config.azureDeployment) throw new ConfigurationError(issues);

      return new OpenAICompatibleProvider({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        azure: { deployment: config.azureDeployment, apiVersion: config.azureApiVersion ?? '2024-06-01' },
        timeoutMs: config.timeoutMs,
      });
    }

    case 'openai-compatible':
      return new OpenAICompatibleProvider({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
      });
  }
}
