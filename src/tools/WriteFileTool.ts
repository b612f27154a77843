/**
 * WriteFileTool - Create or overwrite a file
 *
 * Parent directories are created after the target path has been authorized,
 * so a denied path never leaves empty directories behind.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { BaseTool, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { logger } from '../services/Logger.js';

export class WriteFileTool extends BaseTool {
  readonly name = 'write_file';
  readonly description = 'Write content to a file, creating it and any missing parent directories';
  readonly parameters: Record<string, ParameterSchema> = {
    path: {
      type: 'string',
      description: 'Path of the file to write',
    },
    content: {
      type: 'string',
      description: 'Complete new content of the file',
    },
  };
  readonly required = ['path', 'content'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const requested = this.stringArg(args, 'path');
    const content = this.stringArg(args, 'content');
    const filePath = await this.authorizePath(requested, context);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');

    logger.debug(`[WRITE_FILE] Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${filePath}`);
    return this.formatSuccessResponse(`Successfully wrote to ${requested}`);
  }
}
