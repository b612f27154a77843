/**
 * SecurityPolicy construction
 *
 * The policy is built once per session from the configuration snapshot and
 * frozen. Roots are canonicalized up front so the validator compares like
 * with like.
 */

import type { Config, SecurityPolicy } from '../types/index.js';
import { logger } from '../services/Logger.js';
import { canonicalizePath } from './pathUtils.js';

function canonicalRoots(roots: readonly string[], workingDirectory: string, label: string): string[] {
  const resolved: string[] = [];
  for (const root of roots) {
    const canonical = canonicalizePath(root, workingDirectory);
    if (canonical === null) {
      logger.warn(`[SECURITY] Ignoring unresolvable ${label} root: ${root}`);
      continue;
    }
    if (!resolved.includes(canonical)) {
      resolved.push(canonical);
    }
  }
  return resolved;
}

export function buildSecurityPolicy(
  config: Pick<Config, 'trusted_roots' | 'external_allowed_roots' | 'excluded_glob_patterns' | 'require_approval'>,
  workingDirectory: string
): SecurityPolicy {
  const canonicalCwd = canonicalizePath(workingDirectory, workingDirectory) ?? workingDirectory;

  const trusted =
    config.trusted_roots.length > 0
      ? canonicalRoots(config.trusted_roots, canonicalCwd, 'trusted')
      : [canonicalCwd];

  const policy: SecurityPolicy = {
    working_directory: canonicalCwd,
    trusted_roots: Object.freeze(trusted),
    external_allowed_roots: Object.freeze(
      canonicalRoots(config.external_allowed_roots, canonicalCwd, 'external')
    ),
    excluded_glob_patterns: Object.freeze([...config.excluded_glob_patterns]),
    require_approval: config.require_approval,
  };

  logger.debug(
    '[SECURITY] Policy built:',
    `trusted=${policy.trusted_roots.join(',')}`,
    `external=${policy.external_allowed_roots.join(',') || '(none)'}`,
    `approval=${policy.require_approval}`
  );

  return Object.freeze(policy);
}
