/**
 * One-shot HTTP GET for the web tools, with failures classified the same
 * way as model requests
 */

import { NetworkTransient } from '../errors/AgentError.js';
import { createTimeoutSignal } from '../utils/abort.js';
import { cancellationFrom } from '../utils/sleep.js';
import { classifyHttpStatus, classifyNetworkError, parseRetryAfter } from './NetworkError.js';

export type FetchFn = typeof fetch;

export interface FetchTextOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  fetchImpl?: FetchFn;
  /** Names the request in error messages */
  label?: string;
}

export interface FetchTextResult {
  status: number;
  contentType: string;
  text: string;
}

/**
 * @throws NetworkTransient or NetworkPermanent on failure
 * @throws OperationCancelled when `signal` fires
 */
export async function fetchText(url: string, options: FetchTextOptions): Promise<FetchTextResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const label = options.label ?? `GET ${url}`;
  const attempt = createTimeoutSignal(options.signal, options.timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: 'GET',
      headers: options.headers,
      signal: attempt.signal,
    });

    if (!response.ok) {
      throw classifyHttpStatus(
        response.status,
        `${label} failed: HTTP ${response.status}`,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }

    return {
      status: response.status,
      contentType: response.headers.get('content-type') ?? '',
      text: await response.text(),
    };
  } catch (error) {
    if (options.signal?.aborted) {
      throw cancellationFrom(options.signal);
    }
    if (attempt.timedOut()) {
      throw new NetworkTransient(`${label} timed out after ${options.timeoutMs}ms`, 'timeout', undefined, undefined, {
        cause: error,
      });
    }
    throw classifyNetworkError(error);
  } finally {
    attempt.dispose();
  }
}
