/**
 * Abortable sleep
 */

import { OperationCancelled } from '../errors/AgentError.js';

/**
 * Resolve after `ms`, or reject with the signal's OperationCancelled reason
 * (or a plain OperationCancelled) as soon as the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationFrom(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(cancellationFrom(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * The error to raise for an aborted signal. A signal aborted with an
 * OperationCancelled reason keeps that reason (turn_timeout vs cancelled).
 */
export function cancellationFrom(signal: AbortSignal | undefined): OperationCancelled {
  const reason: unknown = signal?.reason;
  return reason instanceof OperationCancelled ? reason : new OperationCancelled();
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancellationFrom(signal);
  }
}
