/**
 * Path canonicalization shared by the policy builder and the validator
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { getErrorCode } from '../utils/errorUtils.js';

/**
 * Boundary-safe containment: '/tmpfile' is not inside '/tmp'
 */
export function isPathWithinDirectory(childPath: string, parentPath: string): boolean {
  if (childPath === parentPath) {
    return true;
  }
  const prefix = parentPath.endsWith(path.sep) ? parentPath : parentPath + path.sep;
  return childPath.startsWith(prefix);
}

/**
 * Expand a leading `~` or `~/`. `~user` forms are not supported.
 */
export function expandHome(input: string): string | null {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/') || input.startsWith('~' + path.sep)) {
    return path.join(os.homedir(), input.slice(2));
  }
  if (input.startsWith('~')) {
    return null;
  }
  return input;
}

/**
 * Resolve a path to its canonical absolute form
 *
 * Symlinks are resolved. A path that does not exist yet resolves through its
 * nearest existing ancestor, so the result is still canonical for the part
 * that exists. Returns null when the path cannot be resolved at all.
 * Reads the filesystem but never modifies it.
 */
export function canonicalizePath(input: string, workingDirectory: string): string | null {
  if (input.trim() === '' || input.includes('\0')) {
    return null;
  }

  const expanded = expandHome(input);
  if (expanded === null) {
    return null;
  }

  const absolute = path.resolve(workingDirectory, expanded);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = fs.realpathSync.native(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch (error) {
      const code = getErrorCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        return null;
      }
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    missing.push(path.basename(current));
    current = parent;
  }
}
