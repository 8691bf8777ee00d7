/**
 * Helpers shared by the provider implementations.
 */

import { ModelServiceError } from '../errors.js';
import type { ModelFailureReason } from '../errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Map an HTTP status from a model API to a failure reason. */
export function reasonForStatus(status: number): ModelFailureReason {
  if (status === 429) return 'rate_limit';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 500) return 'unavailable';
  return 'rejected';
}

/** Tool call arguments arrive as a JSON object or a JSON-encoded string. */
export function parseToolArguments(provider: string, tool: string, raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null || raw === '') return {};
  if (isRecord(raw)) return raw;

  if (typeof raw === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ModelServiceError(
        'malformed_response',
        `${provider} returned unparseable arguments for tool '${tool}'`,
        undefined,
        { cause: error }
      );
    }
    if (isRecord(parsed)) return parsed;
  }

  throw new ModelServiceError('malformed_response', `${provider} returned non-object arguments for tool '${tool}'`);
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
