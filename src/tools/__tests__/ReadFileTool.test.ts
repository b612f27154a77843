/**
 * Tests for ReadFileTool, including the approval flow shared by all path tools
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ReadFileTool } from '../ReadFileTool.js';
import { ActivityEventType, type ApprovalOutcome } from '../../types/index.js';
import { makeTempDir, makeToolContext, recordEvents } from '../../__tests__/helpers/sessionContext.js';

function approvalHandler(outcome: ApprovalOutcome) {
  return { requestApproval: vi.fn<[string, string, AbortSignal | undefined], Promise<ApprovalOutcome>>().mockResolvedValue(outcome) };
}

describe('ReadFileTool', () => {
  let workDir: string;
  let external: string;
  const tool = new ReadFileTool();

  beforeEach(async () => {
    workDir = await makeTempDir('read');
    external = await makeTempDir('read-external');
    await fs.writeFile(path.join(workDir, 'notes.txt'), 'line one\nline two\n');
    await fs.writeFile(path.join(external, 'data.csv'), 'a,b\n1,2\n');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
    await fs.rm(external, { recursive: true, force: true });
  });

  it('reads a file relative to the working directory', async () => {
    const outcome = await tool.execute({ path: 'notes.txt' }, makeToolContext(workDir));
    expect(outcome).toEqual({ success: true, content: 'line one\nline two\n' });
  });

  it('reports a missing file', async () => {
    const outcome = await tool.execute({ path: 'missing.txt' }, makeToolContext(workDir));
    expect(outcome).toEqual({
      success: false,
      content: '',
      error: 'read_file(path="missing.txt"): File not found: missing.txt',
      error_type: 'file_error',
      suggestion: 'Use list_directory or glob_search to locate it',
    });
  });

  it('refuses to read a directory', async () => {
    await fs.mkdir(path.join(workDir, 'sub'));
    const outcome = await tool.execute({ path: 'sub' }, makeToolContext(workDir));
    expect(outcome.error).toBe('read_file(path="sub"): Path is a directory: sub');
    expect(outcome.error_type).toBe('file_error');
  });

  it('denies paths outside every root and records the denial', async () => {
    const target = path.join(external, 'data.csv');
    const context = makeToolContext(workDir);
    const events = recordEvents(context.activityStream);

    const outcome = await tool.execute({ path: target }, context);

    expect(outcome.error_type).toBe('security_error');
    expect(outcome.error).toBe(
      `read_file(path=${JSON.stringify(target)}): Access denied for ${target}: not in allowed external paths`
    );
    expect(events).toHaveLength(1);
    expect(events[0]?.type).toBe(ActivityEventType.ACCESS_DENIED);
    expect(events[0]?.data).toEqual({
      call_id: 'call_test',
      tool: 'read_file',
      requested_path: target,
      path: target,
      reason: 'not in allowed external paths',
    });
  });

  describe('external paths that need approval', () => {
    const externalConfig = () => ({ external_allowed_roots: [external] });

    it('is denied when no approval handler is available', async () => {
      const target = path.join(external, 'data.csv');
      const outcome = await tool.execute({ path: target }, makeToolContext(workDir, { config: externalConfig() }));
      expect(outcome.error).toBe(
        `read_file(path=${JSON.stringify(target)}): Access denied for ${target}: requires approval but no approval handler is available`
      );
    });

    it('reads once when allowed once, and asks again next time', async () => {
      const handler = approvalHandler('allow_once');
      const context = makeToolContext(workDir, { config: externalConfig(), approvalHandler: handler });
      const target = path.join(external, 'data.csv');

      expect((await tool.execute({ path: target }, context)).content).toBe('a,b\n1,2\n');
      expect((await tool.execute({ path: target }, context)).content).toBe('a,b\n1,2\n');

      expect(handler.requestApproval).toHaveBeenCalledTimes(2);
      expect(handler.requestApproval).toHaveBeenCalledWith(target, 'read_file', expect.any(AbortSignal));
      expect(context.sessionTrust.size).toBe(0);
    });

    it('remembers trust_always for the rest of the session', async () => {
      const handler = approvalHandler('trust_always');
      const context = makeToolContext(workDir, { config: externalConfig(), approvalHandler: handler });
      const events = recordEvents(context.activityStream);
      const target = path.join(external, 'data.csv');

      await tool.execute({ path: target }, context);
      const second = await tool.execute({ path: target }, context);

      expect(second).toEqual({ success: true, content: 'a,b\n1,2\n' });
      expect(handler.requestApproval).toHaveBeenCalledTimes(1);
      expect(context.sessionTrust.isTrusted(target)).toBe(true);
      expect(events.map(event => event.type)).toEqual([ActivityEventType.APPROVAL_REQUEST]);
    });

    it('is denied when the user says no', async () => {
      const context = makeToolContext(workDir, { config: externalConfig(), approvalHandler: approvalHandler('deny') });
      const target = path.join(external, 'data.csv');

      const outcome = await tool.execute({ path: target }, context);

      expect(outcome.error_type).toBe('security_error');
      expect(outcome.error).toBe(`read_file(path=${JSON.stringify(target)}): Access denied for ${target}: denied by user`);
    });
  });
});
