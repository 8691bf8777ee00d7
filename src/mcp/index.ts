/**
 * MCP Module
 *
 * JSON-RPC transports and the tools/list + tools/call client used by the
 * tool registry.
 */

export { McpServerClient } from './mcp-client.js';
export {
  createTransport,
  HttpTransport,
  LambdaTransport,
  LAMBDA_SCHEME,
  type LambdaInvoke,
  type LambdaInvokeResult,
  type RequestOptions,
  type ToolServerTransport,
  type TransportOptions,
} from './transport.js';
export type { CallToolResult, JsonRpcResponse, McpMethod, McpTool } from './json-rpc.js';
