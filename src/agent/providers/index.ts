export { AnthropicProvider, type AnthropicProviderConfig, type AnthropicMessagesApi } from './anthropic-provider.js';
export {
  OpenAICompatibleProvider,
  type OpenAICompatibleProviderConfig,
  type AzureDeployment,
} from './openai-compatible-provider.js';
export { createProvider, type ProviderConfig, type ProviderType } from './provider-factory.js';
