/**
 * ID generation utilities
 */

import { randomBytes } from 'crypto';

/**
 * Generate a unique ID, optionally prefixed: `evt_1712345678901_a1b2c3d4`
 */
export function generateId(prefix?: string): string {
  const random = randomBytes(4).toString('hex');
  return prefix ? `${prefix}_${Date.now()}_${random}` : randomBytes(16).toString('hex');
}
