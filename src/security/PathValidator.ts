/**
 * PathValidator - Decides whether a tool may touch a path
 *
 * `validatePath` is a pure function of (path, policy, session trust): it
 * reads the filesystem to canonicalize but has no side effects. Approval
 * prompts and trust updates belong to the caller.
 */

import path from 'path';
import { minimatch } from 'minimatch';
import type { AccessDecision, SecurityPolicy } from '../types/index.js';
import { canonicalizePath, isPathWithinDirectory } from './pathUtils.js';
import type { SessionTrust } from './SessionTrust.js';

const MATCH_OPTIONS = { dot: true, nocase: false };

/**
 * Return the first excluded pattern the canonical path matches. A pattern
 * ending in a trailing globstar also covers the directory it names: the
 * default .ssh pattern denies ~/.ssh itself, not only the files in it.
 */
export function findExcludedPattern(canonicalPath: string, patterns: readonly string[]): string | undefined {
  const posixPath = canonicalPath.split(path.sep).join('/');
  // Patterns are written relative ("**/.ssh/**"); match without the leading slash
  const candidate = posixPath.replace(/^\/+/, '');
  return patterns.find(
    pattern =>
      minimatch(candidate, pattern, MATCH_OPTIONS) ||
      (pattern.endsWith('/**') && minimatch(candidate, pattern.slice(0, -3), MATCH_OPTIONS))
  );
}

export function validatePath(
  requestedPath: string,
  policy: SecurityPolicy,
  sessionTrust: SessionTrust
): AccessDecision {
  const canonical = canonicalizePath(requestedPath, policy.working_directory);
  if (canonical === null) {
    return { kind: 'denied', reason: 'unresolvable path' };
  }

  if (policy.trusted_roots.some(root => isPathWithinDirectory(canonical, root))) {
    return { kind: 'internal', path: canonical };
  }

  const excluded = findExcludedPattern(canonical, policy.excluded_glob_patterns);
  if (excluded !== undefined) {
    return {
      kind: 'denied',
      path: canonical,
      reason: `matches excluded pattern "${excluded}"`,
    };
  }

  if (!policy.external_allowed_roots.some(root => isPathWithinDirectory(canonical, root))) {
    return { kind: 'denied', path: canonical, reason: 'not in allowed external paths' };
  }

  if (!policy.require_approval || sessionTrust.isTrusted(canonical)) {
    return { kind: 'external_allowed', path: canonical };
  }

  return { kind: 'external_needs_approval', path: canonical };
}

/**
 * True when the decision lets the tool proceed without asking anyone
 */
export function isAllowed(decision: AccessDecision): decision is Extract<AccessDecision, { kind: 'internal' | 'external_allowed' }> {
  return decision.kind === 'internal' || decision.kind === 'external_allowed';
}
