/**
 * Network error classification
 *
 * Every failure of an outbound call is mapped to NetworkTransient (worth
 * retrying) or NetworkPermanent. Anything unrecognized is permanent.
 */

import { NetworkError, NetworkPermanent, NetworkTransient } from '../errors/AgentError.js';
import type { NetworkErrorKind } from '../types/index.js';
import {
  TRANSIENT_ERRNO_CODES,
  TRANSIENT_HTTP_STATUSES,
  TRANSIENT_MESSAGE_PATTERNS,
} from '../config/constants.js';
import { formatError, getErrorCode } from '../utils/errorUtils.js';

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }
  const trimmed = header.trim();
  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Classify a non-2xx HTTP response
 */
export function classifyHttpStatus(status: number, message: string, retryAfterMs?: number): NetworkError {
  if (status === 429) {
    return new NetworkTransient(message, 'rate_limited', status, retryAfterMs);
  }
  if (TRANSIENT_HTTP_STATUSES.includes(status)) {
    return new NetworkTransient(message, 'server_error', status, retryAfterMs);
  }
  const kind: NetworkErrorKind = status >= 500 ? 'server_error' : 'client_error';
  return new NetworkPermanent(message, kind, status);
}

function errnoKind(code: string): NetworkErrorKind {
  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return 'dns';
  }
  if (code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT') {
    return 'timeout';
  }
  return 'connection';
}

/**
 * Walk the `cause` chain; fetch wraps socket errors one level down
 */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < 4) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

export function classifyNetworkError(error: unknown): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }

  const message = formatError(error);
  const chain = causeChain(error);

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new NetworkTransient(`Request timed out: ${message}`, 'timeout', undefined, undefined, { cause: error });
  }

  for (const link of chain) {
    const code = getErrorCode(link);
    if (code && TRANSIENT_ERRNO_CODES.includes(code)) {
      return new NetworkTransient(`${code}: ${message}`, errnoKind(code), undefined, undefined, { cause: error });
    }
  }

  const haystack = chain.map(link => formatError(link)).join(' | ').toLowerCase();
  const pattern = TRANSIENT_MESSAGE_PATTERNS.find(candidate => haystack.includes(candidate));
  if (pattern) {
    const kind: NetworkErrorKind = pattern.includes('time') ? 'timeout' : 'connection';
    return new NetworkTransient(message, kind, undefined, undefined, { cause: error });
  }

  if (error instanceof SyntaxError) {
    return new NetworkPermanent(`Malformed response: ${message}`, 'malformed_response', undefined, undefined, {
      cause: error,
    });
  }

  return new NetworkPermanent(message, 'unknown', undefined, undefined, { cause: error });
}
