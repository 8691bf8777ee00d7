/**
 * Inbox Agent Configuration
 *
 * Centralized configuration loading from environment variables. This is the
 * only module that reads the environment; everything else receives the
 * values it needs from the object returned here.
 */

import { z } from 'zod';
import { ConfigurationError } from '../agent/errors.js';
import type { ProviderType } from '../agent/providers/provider-factory.js';
import type { ToolConcurrency } from '../agent/tool-node.js';
import type { ToolRefreshPolicy } from '../agent/tool-registry.js';
import type { LogLevel } from '../logging/logger.js';
import type { RegistryConfiguration } from '../types/agent-types.js';

/**
 * Environment configuration interface
 */
export interface InboxAgentConfig {
  // Model
  llm: {
    provider: ProviderType;
    model: string;
    apiKey?: string;
    baseUrl?: string;
    azureDeployment?: string;
    azureApiVersion?: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
    /** Extra attempts for transient model failures */
    retries: number;
  };

  // Agent loop
  maxIterations: number;
  toolConcurrency: ToolConcurrency;
  toolTimeoutMs: number;

  // Tool servers
  mcpServers: RegistryConfiguration;
  toolRefresh: ToolRefreshPolicy;
  awsRegion: string;

  // Server
  port: number;
  logLevel: LogLevel;
  promptsDir?: string;
}

const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5';
const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

const EndpointSchema = z
  .string()
  .min(1)
  .refine((v) => /^https?:\/\//i.test(v) || /^lambda:.+/.test(v), {
    message: 'endpoint must be an http(s) URL or lambda:<function-name>',
  });

const ServersSchema = z.record(EndpointSchema);

/**
 * Parse the tool server mapping, a JSON object of server name → endpoint
 */
export function parseServers(raw: string | undefined): RegistryConfiguration {
  if (raw === undefined || raw.trim() === '') return {};

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([`MCP_SERVERS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const parsed = ServersSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => (i.path.length > 0 ? `MCP_SERVERS.${i.path.join('.')}: ${i.message}` : `MCP_SERVERS: ${i.message}`))
    );
  }
  return parsed.data;
}

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const intWithDefault = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const EnvSchema = z.object({
  LLM_PROVIDER: z.preprocess(blankToUndefined, z.enum(['anthropic', 'openai-compatible', 'azure-openai']).optional()),
  LLM_MODEL: optionalString,
  LLM_API_KEY: optionalString,
  LLM_BASE_URL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString,
  AZURE_OPENAI_API_VERSION: optionalString,
  LLM_MAX_TOKENS: intWithDefault(4096, 1),
  LLM_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.1)),
  LLM_TIMEOUT_MS: intWithDefault(60_000, 1),
  MODEL_RETRIES: intWithDefault(0, 0),
  AGENT_MAX_ITERATIONS: intWithDefault(10, 1),
  TOOL_CONCURRENCY: z.preprocess(blankToUndefined, z.enum(['sequential', 'parallel']).default('sequential')),
  TOOL_TIMEOUT_MS: intWithDefault(30_000, 1),
  TOOL_REFRESH: z.preprocess(blankToUndefined, z.enum(['process', 'run']).default('process')),
  AWS_REGION: z.preprocess(blankToUndefined, z.string().default('us-east-2')),
  PORT: intWithDefault(3000, 0),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')),
  PROMPTS_DIR: optionalString,
});

/**
 * Load configuration from environment variables.
 * Call dotenv before invoking this function to pick up a .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InboxAgentConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  const provider = e.LLM_PROVIDER ?? detectProviderType(e);
  const llm = resolveModelSettings(provider, e);

  return {
    llm: {
      ...llm,
      maxTokens: e.LLM_MAX_TOKENS,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      retries: e.MODEL_RETRIES,
    },
    maxIterations: e.AGENT_MAX_ITERATIONS,
    toolConcurrency: e.TOOL_CONCURRENCY,
    toolTimeoutMs: e.TOOL_TIMEOUT_MS,
    // MCP_WRAPPERS is the older name of the same setting.
    mcpServers: parseServers(env.MCP_SERVERS ?? env.MCP_WRAPPERS),
    toolRefresh: e.TOOL_REFRESH,
    awsRegion: e.AWS_REGION,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    promptsDir: e.PROMPTS_DIR,
  };
}

type ParsedEnv = z.infer<typeof EnvSchema>;

/**
 * Detection order:
 * 1. `AZURE_OPENAI_ENDPOINT` set → 'azure-openai'
 * 2. `ANTHROPIC_API_KEY` set → 'anthropic'
 * 3. `LLM_BASE_URL` set → 'openai-compatible'
 * 4. Default → 'anthropic'
 */
function detectProviderType(e: ParsedEnv): ProviderType {
  if (e.AZURE_OPENAI_ENDPOINT) return 'azure-openai';
  if (e.ANTHROPIC_API_KEY) return 'anthropic';
  if (e.LLM_BASE_URL) return 'openai-compatible';
  return 'anthropic';
}

function resolveModelSettings(
  provider: ProviderType,
  e: ParsedEnv
): Pick<InboxAgentConfig['llm'], 'provider' | 'model' | 'apiKey' | 'baseUrl' | 'azureDeployment' | 'azureApiVersion'> {
  switch (provider) {
    case 'anthropic':
      return {
        provider,
        model: e.LLM_MODEL ?? DEFAULT_ANTHROPIC_MODEL,
        apiKey: e.ANTHROPIC_API_KEY ?? e.LLM_API_KEY,
      };
    case 'azure-openai':
      return {
        provider,
        model: e.LLM_MODEL ?? e.AZURE_OPENAI_DEPLOYMENT_NAME ?? DEFAULT_OPENAI_MODEL,
        apiKey: e.AZURE_OPENAI_API_KEY ?? e.LLM_API_KEY,
        baseUrl: e.AZURE_OPENAI_ENDPOINT ?? e.LLM_BASE_URL,
        azureDeployment: e.AZURE_OPENAI_DEPLOYMENT_NAME,
        azureApiVersion: e.AZURE_OPENAI_API_VERSION,
      };
    case 'openai-compatible':
      return {
        provider,
        model: e.LLM_MODEL ?? DEFAULT_OPENAI_MODEL,
        apiKey: e.LLM_API_KEY,
        baseUrl: e.LLM_BASE_URL,
      };
  }
}

/**
 * Cached configuration instance
 */
let cachedConfig: InboxAgentConfig | null = null;

/**
 * Get configuration (loads once and caches)
 */
export function getConfig(): InboxAgentConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached configuration (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Validate what a running agent needs beyond well-formed values
 */
export function validateConfig(config: InboxAgentConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (Object.keys(config.mcpServers).length === 0) {
    errors.push('MCP_SERVERS must name at least one tool server');
  }

  if (config.llm.provider === 'anthropic' && !config.llm.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required for the anthropic provider');
  }

  if (config.llm.provider === 'azure-openai') {
    if (!config.llm.baseUrl) errors.push('AZURE_OPENAI_ENDPOINT is required for the azure-openai provider');
    if (!config.llm.apiKey) errors.push('AZURE_OPENAI_API_KEY is required for the azure-openai provider');
    if (!config.llm.azureDeployment) errors.push('AZURE_OPENAI_DEPLOYMENT_NAME is required for the azure-openai provider');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
