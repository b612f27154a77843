/**
 * SaveMemoryTool - Append a fact to the user's long-term memory file
 *
 * The file lives in the agent's own home directory, not in a model-chosen
 * location, so it is not routed through the path validator.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { MEMORY_FILE } from '../config/paths.js';

export class SaveMemoryTool extends BaseTool {
  readonly name = 'save_memory';
  readonly description = 'Save a short fact about the user or project to long-term memory';
  readonly parameters: Record<string, ParameterSchema> = {
    fact: {
      type: 'string',
      description: 'The fact to remember, as one sentence',
    },
  };
  readonly required = ['fact'];

  constructor(private readonly memoryFile: string = MEMORY_FILE) {
    super();
  }

  protected async executeImpl(args: ToolArguments, _context: ToolContext): Promise<ToolOutcome> {
    const fact = this.stringArg(args, 'fact').replace(/\s*\n\s*/g, ' ').trim();
    if (fact.length === 0) {
      throw new ToolError('fact cannot be empty', 'validation_error');
    }

    await fs.mkdir(path.dirname(this.memoryFile), { recursive: true });
    await fs.appendFile(this.memoryFile, `- ${fact}\n`, 'utf-8');

    return this.formatSuccessResponse('Fact saved to memory.');
  }
}
