/**
 * Centralized file name patterns for tree-mirror
 *
 * Shared by:
 * - fileFilter.ts (exclusions)
 * - Reconciler.ts (temporary copy names)
 */

/**
 * gitignore-style file read from the source root on every pass
 */
export const DEFAULT_IGNORE_FILE = '.mirrorignore';

/**
 * Suffix of the temporary sibling a file is copied to before being renamed
 * into place
 */
export const TEMP_COPY_SUFFIX = '.tree-mirror.tmp';

/**
 * Temporary copy name for a replica file: `.<name>.<pid>.tree-mirror.tmp`
 */
export function tempCopyName(baseName: string, pid: number = process.pid): string {
  return `.${baseName}.${pid}${TEMP_COPY_SUFFIX}`;
}

/**
 * True for names produced by tempCopyName()
 */
export function isTempCopyName(baseName: string): boolean {
  return baseName.startsWith('.') && baseName.endsWith(TEMP_COPY_SUFFIX);
}
