/**
 * Path Expansion Utilities
 *
 * Expands and normalizes user-supplied directory paths.
 * Used by: root validation, log directory setup, config file loading
 */

import { homedir } from 'os';
import path from 'path';

/**
 * Expand tilde (~) to user's home directory
 *
 * @example
 * expandTilde('~/backups/photos') → '/Users/john/backups/photos'
 * expandTilde('/absolute/dir') → '/absolute/dir'
 */
export function expandTilde(p: string): string {
  if (p.startsWith('~/')) {
    return p.replace('~', homedir());
  }
  if (p === '~') {
    return homedir();
  }
  return p;
}

/**
 * Expand ~ and resolve against cwd, dropping any trailing separator
 */
export function resolveUserPath(p: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, expandTilde(p));
}

/**
 * Directories a replica may never be: every pass deletes whatever the source
 * lacks, so mirroring into one of these would wipe the system.
 */
const PROTECTED_PATHS = [
  '/',
  '/etc',
  '/System',
  '/var',
  '/bin',
  '/sbin',
  '/usr',
  '/usr/bin',
  '/usr/sbin',
  '/Library',
  '/private/etc',
  '/private/var',
];

/**
 * True when an absolute path is a filesystem root, a protected system
 * directory, or the user's home directory itself
 */
export function isProtectedPath(absolutePath: string): boolean {
  const normalized = path.resolve(absolutePath);
  if (normalized === path.parse(normalized).root) {
    return true;
  }
  if (normalized === path.resolve(homedir())) {
    return true;
  }
  const lower = normalized.toLowerCase();
  return PROTECTED_PATHS.some(blocked => lower === blocked.toLowerCase());
}
