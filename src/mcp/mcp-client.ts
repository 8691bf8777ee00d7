/**
 * MCP Tool Server Client
 *
 * `tools/list` and `tools/call` on top of a ToolServerTransport.
 */

import { ConnectivityError, ToolExecutionError } from '../agent/errors.js';
import type { ToolResult } from '../types/agent-types.js';
import { CallToolResultSchema, contentToText, ListToolsResultSchema } from './json-rpc.js';
import type { McpTool } from './json-rpc.js';
import type { RequestOptions, ToolServerTransport } from './transport.js';

/** Upper bound on `nextCursor` pages followed during one listing. */
const MAX_LIST_PAGES = 20;

export class McpServerClient {
  constructor(readonly transport: ToolServerTransport) {}

  get server(): string {
    return this.transport.server;
  }

  async listTools(options: RequestOptions = {}): Promise<McpTool[]> {
    const tools: McpTool[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const response = await this.transport.request('tools/list', cursor ? { cursor } : {}, options);

      if (response.error) {
        throw new ConnectivityError(
          this.server,
          `tools/list failed on '${this.server}' (${response.error.code}): ${response.error.message}`
        );
      }

      const parsed = ListToolsResultSchema.safeParse(response.result);
      if (!parsed.success) {
        throw new ConnectivityError(
          this.server,
          `tools/list on '${this.server}' returned an invalid listing: ${parsed.error.issues
            .map((i) => `${i.path.join('.')}: ${i.message}`)
            .join(', ')}`
        );
      }

      tools.push(...parsed.data.tools);
      cursor = parsed.data.nextCursor;
      if (!cursor) break;
    }

    return tools;
  }

  /**
   * Invoke a tool. JSON-RPC level errors and malformed results raise
   * ToolExecutionError; transport failures surface as ConnectivityError.
   */
  async callTool(name: string, args: Record<string, unknown>, options: RequestOptions = {}): Promise<ToolResult> {
    const response = await this.transport.request('tools/call', { name, arguments: args }, options);

    if (response.error) {
      throw new ToolExecutionError(name, `Error (${response.error.code}): ${response.error.message}`, response.error.code);
    }

    const parsed = CallToolResultSchema.safeParse(response.result);
    if (!parsed.success) {
      throw new ToolExecutionError(name, `Tool '${name}' returned a malformed result`);
    }

    const text = contentToText(parsed.data);
    return {
      content: text || '(empty response from tool server)',
      ...(parsed.data.isError ? { isError: true } : {}),
    };
  }
}
