/**
 * ListDirectoryTool - One level of a directory, directories marked with "/"
 */

import { promises as fs, type Stats } from 'fs';
import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { isFileNotFoundError } from '../utils/errorUtils.js';

export class ListDirectoryTool extends BaseTool {
  readonly name = 'list_directory';
  readonly description = 'List the entries of a directory. Subdirectories end with "/"';
  readonly parameters: Record<string, ParameterSchema> = {
    path: {
      type: 'string',
      description: 'Directory to list (use "." for the working directory)',
    },
  };
  readonly required = ['path'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const requested = this.stringArg(args, 'path');
    const dirPath = await this.authorizePath(requested, context);

    let stats: Stats;
    try {
      stats = await fs.stat(dirPath);
    } catch (error) {
      if (isFileNotFoundError(error)) {
        throw new ToolError(`Directory not found: ${requested}`, 'file_error');
      }
      throw error;
    }
    if (!stats.isDirectory()) {
      throw new ToolError(`Path is not a directory: ${requested}`, 'file_error', 'Use read_file for files');
    }

    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    const lines = entries
      .map(entry => (entry.isDirectory() ? `${entry.name}/` : entry.name))
      .sort((a, b) => a.localeCompare(b));

    return this.formatSuccessResponse(lines.length > 0 ? lines.join('\n') : '(empty directory)');
  }
}
