/**
 * Tool Registry
 *
 * Resolves the tools published by every configured tool server into one
 * name → descriptor table. Invocation is a table lookup followed by a
 * `tools/call` on the server that published the tool.
 *
 * Duplicate names: the first server (in configuration order) that publishes
 * a name keeps it; later ones are skipped with a warning.
 */

import { ConnectivityError, NoToolsAvailableError, ToolNotFoundError } from './errors.js';
import { createLogger } from '../logging/logger.js';
import { McpServerClient } from '../mcp/mcp-client.js';
import { createTransport } from '../mcp/transport.js';
import type { McpTool } from '../mcp/json-rpc.js';
import type { RequestOptions, ToolServerTransport, TransportOptions } from '../mcp/transport.js';
import type {
  AgentToolDefinition,
  RegistryConfiguration,
  ToolDescriptor,
  ToolResult,
} from '../types/agent-types.js';

const log = createLogger('ToolRegistry');

export type ToolRefreshPolicy = 'process' | 'run';

export const DEFAULT_LIST_TIMEOUT_MS = 30_000;

export interface ToolRegistryOptions extends TransportOptions {
  /** Build the transport for one server; defaults to createTransport */
  transportFactory?: (server: string, endpoint: string, options: TransportOptions) => ToolServerTransport;
  /** Deadline for one server's tools/list, all pages included */
  listTimeoutMs?: number;
}

export class ResolvedToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>;
  private readonly clients: ReadonlyMap<string, McpServerClient>;

  constructor(tools: Map<string, ToolDescriptor>, clients: Map<string, McpServerClient>) {
    this.tools = tools;
    this.clients = clients;
  }

  get size(): number {
    return this.tools.size;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  descriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  /** Capability list handed to the model */
  definitions(): AgentToolDefinition[] {
    return this.descriptors().map((t) => ({
      name: t.name,
      description: t.description,
      input_schema: t.inputSchema,
    }));
  }

  async invoke(name: string, args: Record<string, unknown>, options: RequestOptions = {}): Promise<ToolResult> {
    const descriptor = this.tools.get(name);
    const client = descriptor ? this.clients.get(descriptor.server) : undefined;
    if (!descriptor || !client) {
      throw new ToolNotFoundError(name);
    }
    return client.callTool(name, args, options);
  }
}

/**
 * Query every configured server and merge what they publish. A server that
 * cannot be reached contributes no tools; an empty result is an error.
 */
export async function resolveToolRegistry(
  config: RegistryConfiguration,
  options: ToolRegistryOptions = {}
): Promise<ResolvedToolRegistry> {
  const servers = Object.entries(config);
  const factory = options.transportFactory ?? createTransport;
  log.info(`Resolving tools from ${servers.length} server(s): ${servers.map(([name]) => name).join(', ') || '(none)'}`);

  const clients = servers.map(([server, endpoint]) => new McpServerClient(factory(server, endpoint, options)));

  // Listings run concurrently; merging below follows configuration order.
  const timeoutMs = options.listTimeoutMs ?? DEFAULT_LIST_TIMEOUT_MS;
  const listings = await Promise.all(clients.map((client) => listServer(client, timeoutMs)));

  const tools = new Map<string, ToolDescriptor>();
  const reachable = new Map<string, McpServerClient>();

  listings.forEach((listing, index) => {
    const client = clients[index];
    if (!client || !listing) return;
    reachable.set(client.server, client);

    for (const tool of listing) {
      const existing = tools.get(tool.name);
      if (existing) {
        log.warn(`Tool '${tool.name}' from '${client.server}' ignored; already provided by '${existing.server}'`);
        continue;
      }
      tools.set(tool.name, toDescriptor(tool, client.transport));
    }
  });

  if (tools.size === 0) {
    log.error('No tools could be loaded');
    throw new NoToolsAvailableError(servers.map(([name]) => name));
  }

  log.info(`Loaded ${tools.size} tool(s)`);
  for (const tool of tools.values()) {
    log.info(`   - ${tool.name} (from ${tool.server})`);
  }

  return new ResolvedToolRegistry(tools, reachable);
}

async function listServer(client: McpServerClient, timeoutMs: number): Promise<McpTool[] | null> {
  const signal = AbortSignal.timeout(timeoutMs);
  try {
    const tools = await client.listTools({ signal });
    if (tools.length === 0) {
      log.warn(`${client.server} returned no tools`);
    } else {
      log.info(`${tools.length} tool(s) from ${client.server}`);
    }
    return tools;
  } catch (error) {
    if (error instanceof ConnectivityError) {
      log.error(`Skipping '${client.server}': ${error.message}`);
      return null;
    }
    if (signal.aborted) {
      log.error(`Skipping '${client.server}': tools/list timed out after ${timeoutMs}ms`);
      return null;
    }
    throw error;
  }
}

function toDescriptor(tool: McpTool, transport: ToolServerTransport): ToolDescriptor {
  return Object.freeze({
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    server: transport.server,
    endpoint: transport.endpoint,
  });
}

// =============================================================================
// Cached client
// =============================================================================

/** Anything the loop can ask for the registry of the current run */
export interface ToolRegistrySource {
  getRegistry(): Promise<ResolvedToolRegistry>;
}

export interface ToolRegistryClientOptions extends ToolRegistryOptions {
  refresh?: ToolRefreshPolicy;
}

/**
 * Holds the registry configuration and applies the freshness policy:
 * `process` resolves once and shares the result, `run` resolves on every call.
 */
export class ToolRegistryClient implements ToolRegistrySource {
  private readonly config: RegistryConfiguration;
  private readonly options: ToolRegistryClientOptions;
  private cached: Promise<ResolvedToolRegistry> | null = null;

  constructor(config: RegistryConfiguration, options: ToolRegistryClientOptions = {}) {
    this.config = config;
    this.options = options;
  }

  get refreshPolicy(): ToolRefreshPolicy {
    return this.options.refresh ?? 'process';
  }

  getRegistry(): Promise<ResolvedToolRegistry> {
    if (this.refreshPolicy === 'run') {
      return resolveToolRegistry(this.config, this.options);
    }

    if (!this.cached) {
      // A failed resolution is not cached so the next run retries it.
      this.cached = resolveToolRegistry(this.config, this.options).catch((error: unknown) => {
        this.cached = null;
        throw error;
      });
    }
    return this.cached;
  }

  invalidate(): void {
    this.cached = null;
  }
}
