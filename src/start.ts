#!/usr/bin/env node
/**
 * Inbox Agent - Start Script
 *
 * Usage:
 *   npm run build && npm start
 *
 * Tool servers (required):
 *   MCP_SERVERS='{"classifier":"https://host/mcp","archiver":"lambda:archiver-fn"}'
 *
 * LLM Provider (any one of):
 *   ANTHROPIC_API_KEY=<key>                                   (Anthropic, auto-detected)
 *   AZURE_OPENAI_ENDPOINT=... AZURE_OPENAI_API_KEY=... AZURE_OPENAI_DEPLOYMENT_NAME=...
 *   LLM_PROVIDER=openai-compatible LLM_BASE_URL=... LLM_API_KEY=...
 *
 * Common:
 *   LLM_MODEL=claude-sonnet-4-5 (optional)
 *   AGENT_MAX_ITERATIONS=10 (optional)
 *   TOOL_CONCURRENCY=sequential|parallel (optional)
 *   TOOL_REFRESH=process|run (optional)
 *   PORT=3000 (optional)
 *   LOG_LEVEL=debug|info|warn|error|silent (optional)
 */

import 'dotenv/config';
import { loadConfig, validateConfig } from './config/index.js';
import { setLogLevel } from './logging/logger.js';
import { createWebhookServer, stopOnSignal } from './server/webhook-server.js';
import { createInboxAgent } from './service/inbox-agent-service.js';

async function main() {
  console.log('');
  console.log('╔═══════════════════════════════════════════════════════════╗');
  console.log('║                       Inbox Agent                          ║');
  console.log('║            E-mail orchestration over tool servers          ║');
  console.log('╚═══════════════════════════════════════════════════════════╝');
  console.log('');

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    console.error('ERROR: Invalid configuration');
    console.error('');
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  console.log(`Provider: ${config.llm.provider} (${config.llm.model})`);
  console.log(`Tool servers: ${Object.keys(config.mcpServers).join(', ')}`);
  console.log('');

  const agent = createInboxAgent(config);

  // Resolve tools up front so a misconfigured deployment fails at boot.
  const tools = await agent.listTools();
  console.log(`Tools: ${tools.join(', ')}`);

  const server = createWebhookServer({ agent, port: config.port });
  await server.start();

  const shutdown = stopOnSignal(server);
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
