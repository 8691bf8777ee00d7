/**
 * Tool Server Transports
 *
 * Carry one JSON-RPC request to a tool server and return its parsed reply.
 * Two endpoint forms are understood:
 *
 *   https://host/mcp        JSON-RPC over HTTP POST
 *   lambda:function-name    JSON-RPC payload through AWS Lambda Invoke
 *
 * Any failure to obtain a well-formed reply is raised as ConnectivityError.
 */

import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import type { InvokeCommandInput } from '@aws-sdk/client-lambda';
import { ConfigurationError, ConnectivityError } from '../agent/errors.js';
import { createLogger, preview } from '../logging/logger.js';
import { buildRequest, JsonRpcResponseSchema } from './json-rpc.js';
import type { JsonRpcResponse, McpMethod } from './json-rpc.js';

const log = createLogger('MCP');

export const LAMBDA_SCHEME = 'lambda:';

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ToolServerTransport {
  readonly server: string;
  readonly endpoint: string;
  request(method: McpMethod, params?: Record<string, unknown>, options?: RequestOptions): Promise<JsonRpcResponse>;
}

/** The part of an Invoke response the transport reads */
export interface LambdaInvokeResult {
  StatusCode?: number;
  FunctionError?: string;
  Payload?: Uint8Array;
}

export type LambdaInvoke = (input: InvokeCommandInput, options?: RequestOptions) => Promise<LambdaInvokeResult>;

export interface TransportOptions {
  /** Region for Lambda endpoints */
  awsRegion?: string;
  /** Override for Lambda invocation (tests, custom credentials) */
  lambdaInvoke?: LambdaInvoke;
  /** Extra headers for HTTP endpoints */
  headers?: Record<string, string>;
}

// ============================================================================
// HTTP
// ============================================================================

export class HttpTransport implements ToolServerTransport {
  constructor(
    readonly server: string,
    readonly endpoint: string,
    private readonly headers: Record<string, string> = {}
  ) {}

  async request(method: McpMethod, params: Record<string, unknown> = {}, options: RequestOptions = {}): Promise<JsonRpcResponse> {
    const payload = buildRequest(method, params);
    log.debug(`${this.server} → ${method} (${this.endpoint})`);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json', ...this.headers },
        body: JSON.stringify(payload),
        signal: options.signal,
      });
    } catch (error) {
      throw new ConnectivityError(
        this.server,
        `Tool server '${this.server}' is unreachable: ${describe(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ConnectivityError(
        this.server,
        `Tool server '${this.server}' answered HTTP ${response.status}${text ? `: ${preview(text)}` : ''}`
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ConnectivityError(
        this.server,
        `Tool server '${this.server}' reply could not be read: ${describe(error)}`,
        { cause: error }
      );
    }
    return parseReply(this.server, text);
  }
}

// ============================================================================
// AWS Lambda
// ============================================================================

export class LambdaTransport implements ToolServerTransport {
  readonly functionName: string;
  private readonly invoke: LambdaInvoke;

  constructor(
    readonly server: string,
    readonly endpoint: string,
    options: { region?: string; invoke?: LambdaInvoke } = {}
  ) {
    this.functionName = endpoint.slice(LAMBDA_SCHEME.length);
    this.invoke = options.invoke ?? defaultLambdaInvoke(options.region);
  }

  async request(method: McpMethod, params: Record<string, unknown> = {}, options: RequestOptions = {}): Promise<JsonRpcResponse> {
    const payload = buildRequest(method, params);
    log.debug(`${this.server} → ${method} (lambda ${this.functionName})`);

    let output: LambdaInvokeResult;
    try {
      output = await abortable(
        this.invoke(
          {
            FunctionName: this.functionName,
            InvocationType: 'RequestResponse',
            Payload: new TextEncoder().encode(JSON.stringify(payload)),
          },
          options
        ),
        options.signal
      );
    } catch (error) {
      throw new ConnectivityError(
        this.server,
        `Lambda '${this.functionName}' could not be invoked: ${describe(error)}`,
        { cause: error }
      );
    }

    const text = output.Payload ? new TextDecoder().decode(output.Payload) : '';

    if (output.FunctionError) {
      throw new ConnectivityError(
        this.server,
        `Lambda '${this.functionName}' failed (${output.FunctionError})${text ? `: ${preview(text)}` : ''}`
      );
    }

    return parseReply(this.server, text);
  }
}

function defaultLambdaInvoke(region?: string): LambdaInvoke {
  let client: LambdaClient | null = null;
  return (input, options = {}) => {
    if (!client) client = new LambdaClient(region ? { region } : {});
    return client.send(new InvokeCommand(input), { abortSignal: options.signal });
  };
}

// ============================================================================
// Factory / helpers
// ============================================================================

export function createTransport(server: string, endpoint: string, options: TransportOptions = {}): ToolServerTransport {
  if (endpoint.startsWith(LAMBDA_SCHEME)) {
    if (endpoint.length === LAMBDA_SCHEME.length) {
      throw new ConfigurationError([`server '${server}': lambda endpoint is missing a function name`]);
    }
    return new LambdaTransport(server, endpoint, { region: options.awsRegion, invoke: options.lambdaInvoke });
  }
  if (/^https?:\/\//i.test(endpoint)) {
    return new HttpTransport(server, endpoint, options.headers);
  }
  throw new ConfigurationError([`server '${server}': unsupported endpoint '${endpoint}'`]);
}

function parseReply(server: string, text: string): JsonRpcResponse {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ConnectivityError(server, `Tool server '${server}' returned a non-JSON reply: ${preview(text)}`);
  }

  const parsed = JsonRpcResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConnectivityError(
      server,
      `Tool server '${server}' returned a malformed JSON-RPC reply: ${parsed.error.issues.map((i) => i.message).join(', ')}`
    );
  }
  return parsed.data;
}

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
