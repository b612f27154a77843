/**
 * SessionTrust - Paths the user chose to "trust always" during this session
 *
 * The set only grows. Every method is synchronous, so a check and an update
 * can never interleave with another session's await.
 */

import { logger } from '../services/Logger.js';
import { isPathWithinDirectory } from './pathUtils.js';

export class SessionTrust {
  private readonly trustedPaths = new Set<string>();

  /**
   * Record a canonical path as trusted. Trusting a directory covers its contents.
   */
  trust(canonicalPath: string): void {
    if (!this.trustedPaths.has(canonicalPath)) {
      this.trustedPaths.add(canonicalPath);
      logger.verbose(`[SECURITY] Session trust granted: ${canonicalPath}`);
    }
  }

  /**
   * True if the path or one of its ancestors was trusted
   */
  isTrusted(canonicalPath: string): boolean {
    for (const trusted of this.trustedPaths) {
      if (isPathWithinDirectory(canonicalPath, trusted)) {
        return true;
      }
    }
    return false;
  }

  list(): string[] {
    return [...this.trustedPaths];
  }

  get size(): number {
    return this.trustedPaths.size;
  }
}
