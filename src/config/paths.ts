/**
 * Path configuration for Bastion
 *
 * BASTION_HOME overrides the data directory, mainly for tests and sandboxes.
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Base directory for all Bastion data
 */
export const BASTION_HOME = process.env.BASTION_HOME || join(homedir(), '.bastion');

/**
 * Default configuration file
 */
export const CONFIG_FILE = join(BASTION_HOME, 'config.json');

/**
 * Facts saved by the save_memory tool
 */
export const MEMORY_FILE = join(BASTION_HOME, 'memory.md');
