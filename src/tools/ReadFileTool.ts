/**
 * ReadFileTool - Return the text of one file
 */

import { promises as fs, type Stats } from 'fs';
import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { isFileNotFoundError } from '../utils/errorUtils.js';

export class ReadFileTool extends BaseTool {
  readonly name = 'read_file';
  readonly description = 'Read the full text content of a file';
  readonly parameters: Record<string, ParameterSchema> = {
    path: {
      type: 'string',
      description: 'Path to the file, absolute or relative to the working directory',
    },
  };
  readonly required = ['path'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const requested = this.stringArg(args, 'path');
    const filePath = await this.authorizePath(requested, context);

    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      if (isFileNotFoundError(error)) {
        throw new ToolError(`File not found: ${requested}`, 'file_error', 'Use list_directory or glob_search to locate it');
      }
      throw error;
    }

    if (stats.isDirectory()) {
      throw new ToolError(`Path is a directory: ${requested}`, 'file_error', 'Use list_directory for directories');
    }

    const content = await fs.readFile(filePath, 'utf-8');
    return this.formatSuccessResponse(content);
  }
}
