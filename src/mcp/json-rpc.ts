/**
 * JSON-RPC envelope and MCP tool payload schemas.
 *
 * Tool servers answer `tools/list` and `tools/call`. Some deployments omit
 * the `jsonrpc`/`id` fields and reply with a bare `{ result }` or `{ error }`,
 * so both are optional here.
 */

import { z } from 'zod';

export type McpMethod = 'tools/list' | 'tools/call';

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: McpMethod;
  params: Record<string, unknown>;
}

export const JsonRpcErrorSchema = z.object({
  code: z.number().default(-1),
  message: z.string().default('Unknown error'),
  data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z
  .object({
    jsonrpc: z.literal('2.0').optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    result: z.unknown().optional(),
    error: JsonRpcErrorSchema.optional(),
  })
  .refine((res) => res.result !== undefined || res.error !== undefined, {
    message: 'response carries neither result nor error',
  });

export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>;
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

// ============================================================================
// tools/list
// ============================================================================

export const McpInputSchemaSchema = z
  .object({
    type: z.literal('object').default('object'),
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

export const McpToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  inputSchema: McpInputSchemaSchema.default({}),
});

export const ListToolsResultSchema = z.object({
  tools: z.array(McpToolSchema).default([]),
  nextCursor: z.string().optional(),
});

export type McpTool = z.infer<typeof McpToolSchema>;
export type ListToolsResult = z.infer<typeof ListToolsResultSchema>;

// ============================================================================
// tools/call
// ============================================================================

export const McpContentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const CallToolResultSchema = z.object({
  content: z.array(McpContentPartSchema).default([]),
  isError: z.boolean().optional(),
});

export type CallToolResult = z.infer<typeof CallToolResultSchema>;

let nextRequestId = 1;

export function buildRequest(method: McpMethod, params: Record<string, unknown> = {}): JsonRpcRequest {
  return { jsonrpc: '2.0', id: nextRequestId++, method, params };
}

/** Flatten MCP content parts into the text handed back to the model. */
export function contentToText(result: CallToolResult): string {
  return result.content
    .map((part) => (part.type === 'text' && part.text !== undefined ? part.text : JSON.stringify(part)))
    .join('\n');
}
