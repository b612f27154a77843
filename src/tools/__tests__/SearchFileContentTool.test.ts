/**
 * Tests for SearchFileContentTool
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { SearchFileContentTool, findMatchingLines } from '../SearchFileContentTool.js';
import { makeTempDir, makeToolContext } from '../../__tests__/helpers/sessionContext.js';

describe('SearchFileContentTool', () => {
  let workDir: string;
  const tool = new SearchFileContentTool();

  beforeEach(async () => {
    workDir = await makeTempDir('search');
    await fs.mkdir(path.join(workDir, 'src'));
    await fs.writeFile(path.join(workDir, 'src', 'a.ts'), 'const x = 1;\n// TODO fix\nconst y = 2;\n');
    await fs.writeFile(path.join(workDir, 'src', 'b.ts'), 'export const z = 3;\n');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('searches one file', async () => {
    const outcome = await tool.execute({ path: 'src/a.ts', pattern: 'TODO' }, makeToolContext(workDir));
    expect(outcome).toEqual({ success: true, content: `${path.join(workDir, 'src', 'a.ts')}:2: // TODO fix` });
  });

  it('searches every file under a directory in path order', async () => {
    const outcome = await tool.execute({ path: '.', pattern: '^(export )?const' }, makeToolContext(workDir));
    const a = path.join(workDir, 'src', 'a.ts');
    const b = path.join(workDir, 'src', 'b.ts');

    expect(outcome.content).toBe([`${a}:1: const x = 1;`, `${a}:3: const y = 2;`, `${b}:1: export const z = 3;`].join('\n'));
  });

  it('skips binary files', async () => {
    await fs.writeFile(path.join(workDir, 'blob.bin'), Buffer.from([0x63, 0x6f, 0x6e, 0x73, 0x74, 0x00, 0x01]));
    const outcome = await tool.execute({ path: 'blob.bin', pattern: 'const' }, makeToolContext(workDir));
    expect(outcome.content).toBe('No matches found');
  });

  it('reports an invalid pattern', async () => {
    const outcome = await tool.execute({ path: '.', pattern: '[' }, makeToolContext(workDir));
    expect(outcome.error_type).toBe('validation_error');
    expect(outcome.error).toMatch(/^search_file_content\(path="\.", pattern="\["\): Invalid regex pattern: /);
  });

  it('reports a missing path as a file error', async () => {
    const outcome = await tool.execute({ path: 'missing', pattern: 'x' }, makeToolContext(workDir));
    expect(outcome.success).toBe(false);
    expect(outcome.error_type).toBe('file_error');
  });
});

describe('findMatchingLines', () => {
  it('numbers lines from one and handles CRLF', () => {
    expect(findMatchingLines('alpha\r\nbeta\r\nalphabet', /alpha/)).toEqual([
      { line: 1, text: 'alpha' },
      { line: 3, text: 'alphabet' },
    ]);
  });
});
