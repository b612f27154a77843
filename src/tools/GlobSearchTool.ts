/**
 * GlobSearchTool - Find files by glob pattern
 *
 * Every match is passed back through the path validator. Matches that would
 * need approval, or that are denied, are dropped without being mentioned.
 */

import fg from 'fast-glob';
import { BaseTool, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { isAllowed, validatePath } from '../security/PathValidator.js';
import { SEARCH_EXCLUSIONS, TOOL_LIMITS } from '../config/constants.js';
import { throwIfCancelled } from '../utils/sleep.js';
import { logger } from '../services/Logger.js';

export class GlobSearchTool extends BaseTool {
  readonly name = 'glob_search';
  readonly description =
    "Find files matching a glob pattern. Examples: '*.ts', '**/*.test.js', 'src/**/config*'. Use ** to recurse";
  readonly parameters: Record<string, ParameterSchema> = {
    pattern: {
      type: 'string',
      description: 'Glob pattern to match files against',
    },
    path: {
      type: 'string',
      description: 'Directory to search from (default: working directory)',
    },
  };
  readonly required = ['pattern'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const pattern = this.stringArg(args, 'pattern');
    const searchRoot = await this.authorizePath(
      this.optionalStringArg(args, 'path') ?? context.policy.working_directory,
      context
    );

    const found = await fg(pattern, {
      cwd: searchRoot,
      absolute: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: [...SEARCH_EXCLUSIONS],
      suppressErrors: true,
    });
    throwIfCancelled(context.signal);

    const visible = found
      .filter(match => isAllowed(validatePath(match, context.policy, context.sessionTrust)))
      .sort();

    if (visible.length < found.length) {
      logger.debug(`[GLOB_SEARCH] Dropped ${found.length - visible.length} matches outside the policy`);
    }

    if (visible.length === 0) {
      return this.formatSuccessResponse('No files found matching pattern');
    }

    const shown = visible.slice(0, TOOL_LIMITS.GLOB_MAX_RESULTS);
    let content = shown.join('\n');
    if (visible.length > shown.length) {
      content += `\n... (${visible.length - shown.length} more matches not shown)`;
    }
    return this.formatSuccessResponse(content);
  }
}
