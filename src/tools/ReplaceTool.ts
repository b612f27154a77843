/**
 * ReplaceTool - Exact string replacement inside a file
 *
 * Matching is literal (no regex). When `expected_replacements` is omitted
 * exactly one occurrence must exist.
 */

import { promises as fs } from 'fs';
import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { isFileNotFoundError } from '../utils/errorUtils.js';

/**
 * Count non-overlapping occurrences of `needle`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export class ReplaceTool extends BaseTool {
  readonly name = 'replace';
  readonly description =
    'Replace exact text in a file. old_string must match the file content exactly, including whitespace';
  readonly parameters: Record<string, ParameterSchema> = {
    path: {
      type: 'string',
      description: 'Path of the file to edit',
    },
    old_string: {
      type: 'string',
      description: 'Exact text to replace',
    },
    new_string: {
      type: 'string',
      description: 'Replacement text',
    },
    expected_replacements: {
      type: 'integer',
      description: 'Number of occurrences expected (default: 1)',
    },
  };
  readonly required = ['path', 'old_string', 'new_string'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const requested = this.stringArg(args, 'path');
    const oldString = this.stringArg(args, 'old_string');
    const newString = this.stringArg(args, 'new_string');
    const expectedArg = args.expected_replacements;
    const expected = typeof expectedArg === 'number' ? expectedArg : 1;

    const filePath = await this.authorizePath(requested, context);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFoundError(error)) {
        throw new ToolError(`File not found: ${requested}`, 'file_error', 'Use write_file to create new files');
      }
      throw error;
    }

    const found = countOccurrences(content, oldString);
    if (found === 0) {
      throw new ToolError(
        `Failed to replace: '${oldString}' not found in file. Use read_file to verify content.`,
        'validation_error'
      );
    }
    if (found !== expected) {
      throw new ToolError(
        `Failed to replace: Expected ${expected} occurrences, but found ${found}.`,
        'validation_error',
        found > expected
          ? 'Include more surrounding context in old_string, or set expected_replacements'
          : undefined
      );
    }

    // split/join keeps "$&" and friends in new_string literal
    const updated = content.split(oldString).join(newString);
    await fs.writeFile(filePath, updated, 'utf-8');

    return this.formatSuccessResponse(`Successfully replaced ${found} occurrence(s) in ${requested}`);
  }
}
