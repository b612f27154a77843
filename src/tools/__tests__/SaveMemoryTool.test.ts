/**
 * Tests for SaveMemoryTool
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { SaveMemoryTool } from '../SaveMemoryTool.js';
import { makeTempDir, makeToolContext } from '../../__tests__/helpers/sessionContext.js';

describe('SaveMemoryTool', () => {
  let workDir: string;
  let memoryFile: string;

  beforeEach(async () => {
    workDir = await makeTempDir('memory');
    memoryFile = path.join(workDir, 'home', 'memory.md');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('appends one line per fact', async () => {
    const tool = new SaveMemoryTool(memoryFile);
    const context = makeToolContext(workDir);

    expect(await tool.execute({ fact: 'Prefers tabs\n  over spaces' }, context)).toEqual({
      success: true,
      content: 'Fact saved to memory.',
    });
    await tool.execute({ fact: 'Deploys on Fridays' }, context);

    expect(await fs.readFile(memoryFile, 'utf-8')).toBe('- Prefers tabs over spaces\n- Deploys on Fridays\n');
  });

  it('rejects an empty fact', async () => {
    const outcome = await new SaveMemoryTool(memoryFile).execute({ fact: ' \n ' }, makeToolContext(workDir));
    expect(outcome.error).toBe('save_memory(fact=" \\n "): fact cannot be empty');
  });
});
