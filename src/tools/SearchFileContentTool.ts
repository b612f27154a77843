/**
 * SearchFileContentTool - Regex search over a file or a directory tree
 *
 * Output lines are `path:line: text`. In directory mode each candidate file
 * is checked against the path validator; anything not plainly allowed is
 * skipped.
 */

import { promises as fs } from 'fs';
import fg from 'fast-glob';
import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { isAllowed, validatePath } from '../security/PathValidator.js';
import { SEARCH_EXCLUSIONS, TOOL_LIMITS } from '../config/constants.js';
import { formatError } from '../utils/errorUtils.js';
import { throwIfCancelled } from '../utils/sleep.js';
import { logger } from '../services/Logger.js';

/**
 * Matching lines of one file's text, 1-indexed
 */
export function findMatchingLines(text: string, regex: RegExp): Array<{ line: number; text: string }> {
  const matches: Array<{ line: number; text: string }> = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (regex.test(line)) {
      matches.push({ line: i + 1, text: line });
    }
  }
  return matches;
}

export class SearchFileContentTool extends BaseTool {
  readonly name = 'search_file_content';
  readonly description =
    'Search file contents with a regular expression. Searches one file, or every file under a directory';
  readonly parameters: Record<string, ParameterSchema> = {
    path: {
      type: 'string',
      description: 'File or directory to search',
    },
    pattern: {
      type: 'string',
      description: 'Regular expression matched against each line',
    },
  };
  readonly required = ['path', 'pattern'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const requested = this.stringArg(args, 'path');
    const pattern = this.stringArg(args, 'pattern');

    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (error) {
      throw new ToolError(`Invalid regex pattern: ${formatError(error)}`, 'validation_error');
    }

    const target = await this.authorizePath(requested, context);
    const stats = await fs.stat(target);

    const files = stats.isDirectory() ? await this.collectFiles(target, context) : [target];

    const results: string[] = [];
    for (const file of files) {
      throwIfCancelled(context.signal);

      let text: string;
      try {
        text = await fs.readFile(file, 'utf-8');
      } catch (error) {
        logger.debug(`[SEARCH] Skipping unreadable file ${file}: ${formatError(error)}`);
        continue;
      }
      // Binary content
      if (text.includes('\u0000')) {
        continue;
      }

      for (const match of findMatchingLines(text, regex)) {
        results.push(`${file}:${match.line}: ${match.text}`);
        if (results.length >= TOOL_LIMITS.SEARCH_MAX_MATCHES) {
          results.push(`... (stopped after ${TOOL_LIMITS.SEARCH_MAX_MATCHES} matches)`);
          return this.formatSuccessResponse(results.join('\n'));
        }
      }
    }

    return this.formatSuccessResponse(results.length > 0 ? results.join('\n') : 'No matches found');
  }

  private async collectFiles(root: string, context: ToolContext): Promise<string[]> {
    const candidates = await fg('**/*', {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      ignore: [...SEARCH_EXCLUSIONS],
      suppressErrors: true,
    });
    return candidates
      .filter(file => isAllowed(validatePath(file, context.policy, context.sessionTrust)))
      .sort();
  }
}
