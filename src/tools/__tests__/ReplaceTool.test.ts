/**
 * Tests for ReplaceTool
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ReplaceTool, countOccurrences } from '../ReplaceTool.js';
import { makeTempDir, makeToolContext } from '../../__tests__/helpers/sessionContext.js';
import type { ToolContext } from '../BaseTool.js';

describe('ReplaceTool', () => {
  let workDir: string;
  let context: ToolContext;
  const tool = new ReplaceTool();
  const read = () => fs.readFile(path.join(workDir, 'f.txt'), 'utf-8');

  beforeEach(async () => {
    workDir = await makeTempDir('replace');
    context = makeToolContext(workDir);
    await fs.writeFile(path.join(workDir, 'f.txt'), 'const a = 1;\nconst b = 2;\nconst c = 3;\n');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('replaces a single exact occurrence', async () => {
    const outcome = await tool.execute(
      { path: 'f.txt', old_string: 'const b = 2;', new_string: 'const b = 20;' },
      context
    );

    expect(outcome).toEqual({ success: true, content: 'Successfully replaced 1 occurrence(s) in f.txt' });
    expect(await read()).toBe('const a = 1;\nconst b = 20;\nconst c = 3;\n');
  });

  it('fails when the text is not present', async () => {
    const outcome = await tool.execute({ path: 'f.txt', old_string: 'let d', new_string: 'x' }, context);

    expect(outcome.error).toBe(
      `replace(path="f.txt", old_string="let d", new_string="x"): Failed to replace: 'let d' not found in file. Use read_file to verify content.`
    );
    expect(outcome.error_type).toBe('validation_error');
  });

  it('fails without writing when the count differs from the expectation', async () => {
    const outcome = await tool.execute({ path: 'f.txt', old_string: 'const', new_string: 'let' }, context);

    expect(outcome.error).toBe(
      'replace(path="f.txt", old_string="const", new_string="let"): Failed to replace: Expected 1 occurrences, but found 3.'
    );
    expect(outcome.suggestion).toBe('Include more surrounding context in old_string, or set expected_replacements');
    expect(await read()).toBe('const a = 1;\nconst b = 2;\nconst c = 3;\n');
  });

  it('replaces every occurrence when the expected count matches', async () => {
    const outcome = await tool.execute(
      { path: 'f.txt', old_string: 'const', new_string: 'let', expected_replacements: 3 },
      context
    );

    expect(outcome.content).toBe('Successfully replaced 3 occurrence(s) in f.txt');
    expect(await read()).toBe('let a = 1;\nlet b = 2;\nlet c = 3;\n');
  });

  it('inserts replacement text literally', async () => {
    await tool.execute({ path: 'f.txt', old_string: 'a = 1', new_string: "a = '$&'" }, context);
    expect(await read()).toBe("const a = '$&';\nconst b = 2;\nconst c = 3;\n");
  });

  it('reports a missing file', async () => {
    const outcome = await tool.execute({ path: 'nope.txt', old_string: 'a', new_string: 'b' }, context);
    expect(outcome.error).toBe('replace(path="nope.txt", old_string="a", new_string="b"): File not found: nope.txt');
    expect(outcome.suggestion).toBe('Use write_file to create new files');
  });
});

describe('countOccurrences', () => {
  it('counts non-overlapping matches', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abc', 'd')).toBe(0);
    expect(countOccurrences('abc', '')).toBe(0);
  });
});
