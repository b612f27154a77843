/**
 * Tests for validatePath
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs, existsSync } from 'fs';
import os from 'os';
import path from 'path';
import { validatePath, isAllowed, findExcludedPattern } from '../PathValidator.js';
import { buildSecurityPolicy } from '../SecurityPolicy.js';
import { SessionTrust } from '../SessionTrust.js';
import { isPathWithinDirectory } from '../pathUtils.js';
import { DEFAULT_EXCLUDED_PATTERNS } from '../../config/defaults.js';
import type { SecurityPolicy } from '../../types/index.js';
import { makeTempDir } from '../../__tests__/helpers/sessionContext.js';

describe('validatePath', () => {
  let base: string;
  let project: string;
  let external: string;
  let outside: string;
  let trust: SessionTrust;

  const policyFor = (overrides: { external?: string[]; requireApproval?: boolean } = {}): SecurityPolicy =>
    buildSecurityPolicy(
      {
        trusted_roots: [project],
        external_allowed_roots: overrides.external ?? [external],
        excluded_glob_patterns: [...DEFAULT_EXCLUDED_PATTERNS],
        require_approval: overrides.requireApproval ?? true,
      },
      project
    );

  beforeEach(async () => {
    base = await makeTempDir('validator');
    project = path.join(base, 'project');
    external = path.join(base, 'external');
    outside = path.join(base, 'outside');
    await fs.mkdir(path.join(project, 'src'), { recursive: true });
    await fs.mkdir(external);
    await fs.mkdir(outside);
    trust = new SessionTrust();
  });

  afterEach(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  describe('trusted roots', () => {
    it('treats a relative path inside the working directory as internal', () => {
      const decision = validatePath('./src/main.rs', policyFor(), trust);
      expect(decision).toEqual({ kind: 'internal', path: path.join(project, 'src', 'main.rs') });
    });

    it('resolves a not-yet-existing nested path through its existing ancestor', () => {
      const decision = validatePath('new/dir/file.txt', policyFor(), trust);
      expect(decision).toEqual({ kind: 'internal', path: path.join(project, 'new', 'dir', 'file.txt') });
    });

    it('does not treat a sibling with a common prefix as inside the root', async () => {
      const sibling = path.join(base, 'project-other');
      await fs.mkdir(sibling);
      const decision = validatePath(path.join(sibling, 'a.txt'), policyFor(), trust);
      expect(decision).toEqual({
        kind: 'denied',
        path: path.join(sibling, 'a.txt'),
        reason: 'not in allowed external paths',
      });
    });

    it('collapses .. before checking containment', () => {
      const decision = validatePath('../outside/notes.txt', policyFor(), trust);
      expect(decision).toEqual({
        kind: 'denied',
        path: path.join(outside, 'notes.txt'),
        reason: 'not in allowed external paths',
      });
    });

    it('follows symlinks that point out of the trusted root', async () => {
      await fs.writeFile(path.join(outside, 'target.txt'), 'data');
      await fs.symlink(path.join(outside, 'target.txt'), path.join(project, 'link.txt'));

      const decision = validatePath('link.txt', policyFor(), trust);
      expect(decision).toEqual({
        kind: 'denied',
        path: path.join(outside, 'target.txt'),
        reason: 'not in allowed external paths',
      });
    });

    it('trusted roots take precedence over excluded patterns', () => {
      const decision = validatePath('.env', policyFor(), trust);
      expect(decision).toEqual({ kind: 'internal', path: path.join(project, '.env') });
    });
  });

  describe('excluded patterns', () => {
    it('denies ~/.ssh/id_rsa', () => {
      const decision = validatePath('~/.ssh/id_rsa', policyFor({ external: [os.homedir()] }), trust);
      expect(decision.kind).toBe('denied');
      if (decision.kind === 'denied') {
        expect(decision.reason).toBe('matches excluded pattern "**/.ssh/**"');
      }
    });

    it('applies exclusion inside an allowed external root', () => {
      const decision = validatePath(path.join(external, '.env.local'), policyFor(), trust);
      expect(decision).toEqual({
        kind: 'denied',
        path: path.join(external, '.env.local'),
        reason: 'matches excluded pattern "**/.env.*"',
      });
    });

    it('applies exclusion even to session-trusted paths', () => {
      trust.trust(external);
      const decision = validatePath(path.join(external, 'server.pem'), policyFor(), trust);
      expect(decision.kind).toBe('denied');
    });

    it('denies an excluded directory itself, not only the files in it', async () => {
      const sshDir = path.join(external, '.ssh');
      await fs.mkdir(sshDir);

      const decision = validatePath(sshDir, policyFor({ requireApproval: false }), trust);
      expect(decision).toEqual({ kind: 'denied', path: sshDir, reason: 'matches excluded pattern "**/.ssh/**"' });
    });

    it('does not stretch a directory pattern to a similarly named sibling', () => {
      expect(findExcludedPattern('/home/u/.ssh', DEFAULT_EXCLUDED_PATTERNS)).toBe('**/.ssh/**');
      expect(findExcludedPattern('/home/u/.sshx', DEFAULT_EXCLUDED_PATTERNS)).toBeUndefined();
      expect(findExcludedPattern('/home/u/.aws', DEFAULT_EXCLUDED_PATTERNS)).toBe('**/.aws/**');
    });

    it('reports the first matching pattern', () => {
      expect(findExcludedPattern('/home/u/.aws/credentials', DEFAULT_EXCLUDED_PATTERNS)).toBe('**/.aws/**');
      expect(findExcludedPattern('/home/u/project/my_secret_notes.txt', DEFAULT_EXCLUDED_PATTERNS)).toBe(
        '**/*secret*'
      );
      expect(findExcludedPattern('/home/u/project/readme.md', DEFAULT_EXCLUDED_PATTERNS)).toBeUndefined();
    });
  });

  describe('external roots', () => {
    it('needs approval inside an allowed root by default', () => {
      const target = path.join(external, 'data.csv');
      expect(validatePath(target, policyFor(), trust)).toEqual({ kind: 'external_needs_approval', path: target });
    });

    it('is allowed when approval is not required', () => {
      const target = path.join(external, 'data.csv');
      expect(validatePath(target, policyFor({ requireApproval: false }), trust)).toEqual({
        kind: 'external_allowed',
        path: target,
      });
    });

    it('is allowed when an ancestor directory was trusted for the session', () => {
      trust.trust(external);
      const target = path.join(external, 'nested', 'data.csv');
      expect(validatePath(target, policyFor(), trust)).toEqual({ kind: 'external_allowed', path: target });
    });

    it('denies paths outside every root', () => {
      const target = path.join(outside, 'x.txt');
      expect(validatePath(target, policyFor(), trust)).toEqual({
        kind: 'denied',
        path: target,
        reason: 'not in allowed external paths',
      });
    });
  });

  describe('unresolvable input', () => {
    it.each(['', '   ', 'bad\0name', '~someone/file'])('denies %j', input => {
      expect(validatePath(input, policyFor(), trust)).toEqual({ kind: 'denied', reason: 'unresolvable path' });
    });
  });

  it('has no side effects on the filesystem', () => {
    validatePath('will/not/be/created.txt', policyFor(), trust);
    expect(existsSync(path.join(project, 'will'))).toBe(false);
    expect(trust.size).toBe(0);
  });

  it('narrows allowed decisions with isAllowed', () => {
    expect(isAllowed({ kind: 'internal', path: '/a' })).toBe(true);
    expect(isAllowed({ kind: 'external_allowed', path: '/a' })).toBe(true);
    expect(isAllowed({ kind: 'external_needs_approval', path: '/a' })).toBe(false);
    expect(isAllowed({ kind: 'denied', reason: 'x' })).toBe(false);
  });
});

describe('isPathWithinDirectory', () => {
  it('matches the directory itself and its descendants only', () => {
    expect(isPathWithinDirectory('/srv/app', '/srv/app')).toBe(true);
    expect(isPathWithinDirectory('/srv/app/lib/x.ts', '/srv/app')).toBe(true);
    expect(isPathWithinDirectory('/srv/application', '/srv/app')).toBe(false);
    expect(isPathWithinDirectory('/srv', '/srv/app')).toBe(false);
  });
});

describe('SessionTrust', () => {
  it('only grows and covers descendants', () => {
    const trust = new SessionTrust();
    trust.trust('/data/shared');
    trust.trust('/data/shared');

    expect(trust.size).toBe(1);
    expect(trust.isTrusted('/data/shared/a/b.txt')).toBe(true);
    expect(trust.isTrusted('/data/other')).toBe(false);
    expect(trust.list()).toEqual(['/data/shared']);
  });
});
