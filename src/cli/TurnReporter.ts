/**
 * TurnReporter - Prints agent activity to stderr as it happens
 *
 * Tool calls, security refusals and retries are shown; the final answer is
 * left to the caller (stdout).
 */

import chalk from 'chalk';
import type { ActivityStream } from '../services/ActivityStream.js';
import { ActivityEventType, type ActivityEvent } from '../types/index.js';
import { TEXT_LIMITS } from '../config/constants.js';

type Writer = (line: string) => void;

function summarizeArguments(value: unknown): string {
  const rendered = JSON.stringify(value) ?? '';
  return rendered.length > TEXT_LIMITS.TOOL_PARAM_VALUE_MAX
    ? `${rendered.slice(0, TEXT_LIMITS.TOOL_PARAM_VALUE_MAX - TEXT_LIMITS.ELLIPSIS_LENGTH)}...`
    : rendered;
}

/**
 * One display line for an event, or null for events not shown
 */
export function formatActivityEvent(event: ActivityEvent): string | null {
  const data = event.data;
  switch (event.type) {
    case ActivityEventType.TOOL_DISPATCH:
      return `${chalk.cyan('→')} ${chalk.bold(String(data.tool))} ${chalk.dim(summarizeArguments(data.arguments))}`;
    case ActivityEventType.TOOL_RESULT:
      return data.is_error
        ? `${chalk.red('✗')} ${String(data.tool)} ${chalk.dim(String(data.error_type ?? 'error'))}`
        : `${chalk.green('✓')} ${String(data.tool)} ${chalk.dim(`${String(data.duration_ms)}ms`)}`;
    case ActivityEventType.ACCESS_DENIED:
      return chalk.red(`[security] ${String(data.tool)} denied ${String(data.requested_path)}: ${String(data.reason)}`);
    case ActivityEventType.THREAT_BLOCKED:
      return chalk.red(`[security] ${String(data.tool)} blocked a ${String(data.level)} command`);
    case ActivityEventType.THREAT_WARNING:
      return chalk.yellow(`[warning] ${String(data.tool)} command flagged as ${String(data.level)}`);
    case ActivityEventType.NETWORK_RETRY:
      return chalk.yellow(
        `[transient] ${String(data.label)} attempt ${String(data.attempt)} failed (${String(data.kind)}), retrying in ${String(data.delay_ms)}ms`
      );
    case ActivityEventType.RATE_LIMITED:
      return chalk.yellow(`[transient] rate limit reached, waiting ${String(data.wait_ms)}ms`);
    default:
      return null;
  }
}

export class TurnReporter {
  private unsubscribe?: () => void;

  constructor(private readonly write: Writer = line => process.stderr.write(`${line}\n`)) {}

  attach(stream: ActivityStream): void {
    this.detach();
    this.unsubscribe = stream.subscribe('*', event => {
      const line = formatActivityEvent(event);
      if (line !== null) {
        this.write(line);
      }
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }
}
