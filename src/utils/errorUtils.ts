/**
 * Error handling and formatting utilities
 */

import type { ToolOutcome, ErrorType, ToolArguments } from '../types/index.js';
import { TEXT_LIMITS } from '../config/constants.js';

/**
 * Format an unknown error value to a string message
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read the errno-style `code` of a thrown value, if it carries one
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isFileNotFoundError(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}

export function isPermissionError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

export function isDirectoryError(error: unknown): boolean {
  return getErrorCode(error) === 'EISDIR';
}

/**
 * Render tool arguments as `key="value", other=3` with long values shortened
 */
export function formatToolParameters(parameters: ToolArguments): string {
  return Object.entries(parameters)
    .map(([key, value]) => {
      let rendered = JSON.stringify(value) ?? 'null';
      if (rendered.length > TEXT_LIMITS.TOOL_PARAM_VALUE_MAX) {
        rendered =
          rendered.slice(0, TEXT_LIMITS.TOOL_PARAM_VALUE_MAX - TEXT_LIMITS.ELLIPSIS_LENGTH) + '...';
      }
      return `${key}=${rendered}`;
    })
    .join(', ');
}

/**
 * Create a structured error outcome
 *
 * The error text names the tool and its arguments, e.g.
 * `read_file(file_path="/tmp/x"): File not found`.
 */
export function createStructuredError(
  errorMessage: string | null | undefined,
  errorType: ErrorType,
  toolName: string | null | undefined,
  parameters?: ToolArguments,
  suggestion?: string
): ToolOutcome {
  const safeErrorMessage = errorMessage?.trim() || 'Unknown error';
  const safeToolName = toolName?.trim() || 'unknown_tool';
  const paramStr = parameters ? formatToolParameters(parameters) : '';

  const outcome: ToolOutcome = {
    success: false,
    content: '',
    error: `${safeToolName}(${paramStr}): ${safeErrorMessage}`,
    error_type: errorType,
  };
  if (suggestion) {
    outcome.suggestion = suggestion;
  }
  return outcome;
}
