/**
 * Tests for ListDirectoryTool
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ListDirectoryTool } from '../ListDirectoryTool.js';
import { makeTempDir, makeToolContext } from '../../__tests__/helpers/sessionContext.js';

describe('ListDirectoryTool', () => {
  let workDir: string;
  const tool = new ListDirectoryTool();

  beforeEach(async () => {
    workDir = await makeTempDir('list');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('lists entries sorted with directories marked', async () => {
    await fs.writeFile(path.join(workDir, 'b.txt'), '');
    await fs.writeFile(path.join(workDir, 'a.txt'), '');
    await fs.mkdir(path.join(workDir, 'src'));

    const outcome = await tool.execute({ path: '.' }, makeToolContext(workDir));
    expect(outcome).toEqual({ success: true, content: 'a.txt\nb.txt\nsrc/' });
  });

  it('refuses to list an excluded directory inside an allowed root', async () => {
    const project = path.join(workDir, 'project');
    const sshDir = path.join(workDir, 'home', '.ssh');
    await fs.mkdir(project);
    await fs.mkdir(sshDir, { recursive: true });
    await fs.writeFile(path.join(sshDir, 'id_rsa'), 'test-key');
    const context = makeToolContext(project, {
      config: { external_allowed_roots: [path.join(workDir, 'home')], require_approval: false },
    });

    const outcome = await tool.execute({ path: sshDir }, context);

    expect(outcome.success).toBe(false);
    expect(outcome.error_type).toBe('security_error');
    expect(outcome.error?.endsWith(`Access denied for ${sshDir}: matches excluded pattern "**/.ssh/**"`)).toBe(true);
  });

  it('says so for an empty directory', async () => {
    const outcome = await tool.execute({ path: '.' }, makeToolContext(workDir));
    expect(outcome.content).toBe('(empty directory)');
  });

  it('rejects a file', async () => {
    await fs.writeFile(path.join(workDir, 'a.txt'), '');
    const outcome = await tool.execute({ path: 'a.txt' }, makeToolContext(workDir));
    expect(outcome.error).toBe('list_directory(path="a.txt"): Path is not a directory: a.txt');
  });

  it('reports a missing directory', async () => {
    const outcome = await tool.execute({ path: 'nope' }, makeToolContext(workDir));
    expect(outcome.error).toBe('list_directory(path="nope"): Directory not found: nope');
    expect(outcome.error_type).toBe('file_error');
  });
});
