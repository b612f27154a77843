/**
 * Error taxonomy for the agent runtime
 *
 * Every failure the loop can observe is an AgentError subclass carrying a
 * stable `code` and a `category`. The category decides how a failure is shown
 * to the user: security decisions and transient hiccups are never rendered
 * the same way.
 */

import type { NetworkErrorKind, ThreatLevel, ThreatReason } from '../types/index.js';

export type AgentErrorCode =
  | 'VALIDATION_DENIED'
  | 'THREAT_BLOCKED'
  | 'TOOL_TIMEOUT'
  | 'TOOL_UNKNOWN'
  | 'NETWORK_TRANSIENT'
  | 'NETWORK_PERMANENT'
  | 'RETRIES_EXHAUSTED'
  | 'ITERATION_LIMIT_REACHED'
  | 'OPERATION_CANCELLED';

export type AgentErrorCategory = 'security' | 'transient' | 'permanent' | 'limit';

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;
  abstract readonly category: AgentErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The path validator refused an access
 */
export class ValidationDenied extends AgentError {
  readonly code = 'VALIDATION_DENIED';
  readonly category = 'security';

  constructor(readonly reason: string, readonly path?: string) {
    super(path ? `Access denied for ${path}: ${reason}` : `Access denied: ${reason}`);
  }
}

export class ThreatBlocked extends AgentError {
  readonly code = 'THREAT_BLOCKED';
  readonly category = 'security';

  constructor(readonly level: ThreatLevel, readonly reasons: readonly ThreatReason[], message: string) {
    super(message);
  }
}

export class ToolTimeout extends AgentError {
  readonly code = 'TOOL_TIMEOUT';
  readonly category = 'transient';

  constructor(readonly toolName: string, readonly timeoutMs: number) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
  }
}

export class ToolUnknown extends AgentError {
  readonly code = 'TOOL_UNKNOWN';
  readonly category = 'permanent';

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

/**
 * Common shape of the two network classifications
 */
export abstract class NetworkError extends AgentError {
  abstract readonly transient: boolean;

  constructor(
    message: string,
    readonly kind: NetworkErrorKind,
    readonly status?: number,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NetworkTransient extends NetworkError {
  readonly code = 'NETWORK_TRANSIENT';
  readonly category = 'transient';
  readonly transient = true;
}

export class NetworkPermanent extends NetworkError {
  readonly code = 'NETWORK_PERMANENT';
  readonly category = 'permanent';
  readonly transient = false;
}

/**
 * The last transient error, after the retry budget ran out
 */
export class RetriesExhausted extends AgentError {
  readonly code = 'RETRIES_EXHAUSTED';
  readonly category = 'transient';

  constructor(readonly attempts: number, readonly lastError: NetworkTransient) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
  }
}

export class IterationLimitReached extends AgentError {
  readonly code = 'ITERATION_LIMIT_REACHED';
  readonly category = 'limit';

  constructor(readonly count: number, readonly configKey: string = 'max_iterations') {
    super(
      `Stopped after ${count} tool iterations without a final answer. ` +
        `Raise "${configKey}" in the configuration or narrow the request.`
    );
  }
}

/**
 * The caller's AbortSignal fired, or the turn budget expired
 */
export class OperationCancelled extends AgentError {
  readonly code = 'OPERATION_CANCELLED';
  readonly category = 'limit';

  constructor(readonly reason: 'cancelled' | 'turn_timeout' = 'cancelled') {
    super(reason === 'turn_timeout' ? 'Turn time budget exceeded' : 'Operation cancelled');
  }
}

/**
 * Prefix shown on error tool results so security refusals read differently
 * from transient or ordinary failures
 */
export function resultTagFor(category: AgentErrorCategory): string {
  switch (category) {
    case 'security':
      return '[security]';
    case 'transient':
      return '[transient]';
    default:
      return '[error]';
  }
}
