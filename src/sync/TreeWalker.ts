/**
 * TreeWalker - Lazy enumeration of every entry under a root directory
 *
 * A directory's children are yielded in sorted name order, and a directory
 * always comes before anything beneath it. Paths are relative to the root
 * and `/`-separated on every platform. Symbolic links are never
 * followed, so link cycles cannot occur.
 *
 * The returned iterable is restartable: each iteration walks the filesystem
 * as it is at that moment.
 */

import { promises as fs, type Dirent, type Stats } from 'fs';
import path from 'path';
import { PathNotFoundError, PathValidationError, errnoOf, describeError } from '../errors/mirrorErrors.js';
import type { FileFilter } from '../utils/fileFilter.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type EntryKind = 'file' | 'directory' | 'special';

/**
 * One file, directory or special node of a tree
 */
export interface TreeEntry {
  /** Relative POSIX path from the root, e.g. `sub/b.txt` */
  path: string;
  kind: EntryKind;
  size: number;
  mtimeMs: number;
}

/**
 * What to do with symlinks, sockets, FIFOs and devices
 * - skip: leave them out and warn (source side)
 * - include: yield them as kind `special` so they can be removed (replica side)
 */
export type SpecialEntryPolicy = 'skip' | 'include';

export interface WalkOptions {
  special?: SpecialEntryPolicy;
  filter?: FileFilter;
  logger?: Logger;
  /** Called for a directory below the root that could not be read; its subtree is skipped */
  onUnreadable?: (relPath: string, error: unknown) => void;
}

/**
 * Join a relative POSIX path and a child name
 */
export function joinRelative(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}

/**
 * Absolute filesystem path of a relative POSIX path under root
 */
export function toAbsolute(root: string, relPath: string): string {
  return relPath === '' ? root : path.join(root, ...relPath.split('/'));
}

function specialLabel(dirent: Dirent): string {
  return dirent.isSymbolicLink() ? 'symbolic link' : 'special file';
}

async function assertRootDirectory(root: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (error: unknown) {
    if (errnoOf(error) === 'ENOENT' || errnoOf(error) === 'ENOTDIR') {
      throw new PathNotFoundError(root, 'root');
    }
    throw error;
  }
  if (!stat.isDirectory()) {
    throw new PathValidationError('not_a_directory', root);
  }
}

async function* walk(root: string, options: WalkOptions): AsyncGenerator<TreeEntry> {
  const { special = 'skip', filter, logger = silentLogger, onUnreadable } = options;

  await assertRootDirectory(root);

  // Explicit stack instead of recursion; pushed in reverse to pop in name order
  const pending: string[] = [''];

  while (pending.length > 0) {
    const dirRel = pending.pop() ?? '';
    const dirAbs = toAbsolute(root, dirRel);

    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(dirAbs, { withFileTypes: true });
    } catch (error: unknown) {
      if (dirRel === '') {
        throw error;
      }
      logger.warn(`[WALK] Cannot read directory "${dirRel}" under ${root}: ${describeError(error)}`);
      onUnreadable?.(dirRel, error);
      continue;
    }

    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const subdirs: string[] = [];

    for (const dirent of dirents) {
      const relPath = joinRelative(dirRel, dirent.name);
      const isDirectory = dirent.isDirectory();

      if (filter?.shouldSkip(relPath, isDirectory)) {
        logger.debug(`[WALK] Excluded: ${relPath}`);
        continue;
      }

      let stat: Stats;
      try {
        stat = await fs.lstat(path.join(dirAbs, dirent.name));
      } catch (error: unknown) {
        // Removed between readdir and lstat
        if (errnoOf(error) === 'ENOENT') {
          continue;
        }
        throw error;
      }

      if (stat.isDirectory()) {
        yield { path: relPath, kind: 'directory', size: 0, mtimeMs: stat.mtimeMs };
        subdirs.push(relPath);
      } else if (stat.isFile()) {
        yield { path: relPath, kind: 'file', size: stat.size, mtimeMs: stat.mtimeMs };
      } else if (special === 'include') {
        yield { path: relPath, kind: 'special', size: stat.size, mtimeMs: stat.mtimeMs };
      } else {
        logger.warn(`[WALK] Skipping ${specialLabel(dirent)} "${relPath}"`);
      }
    }

    for (let i = subdirs.length - 1; i >= 0; i--) {
      pending.push(subdirs[i]);
    }
  }
}

/**
 * Enumerate every entry under root
 *
 * @throws PathNotFoundError when iteration starts and root does not exist
 * @throws PathValidationError when root is not a directory
 */
export function walkTree(root: string, options: WalkOptions = {}): AsyncIterable<TreeEntry> {
  return {
    [Symbol.asyncIterator]: () => walk(root, options)
  };
}

/**
 * Drain a walk into a map keyed by relative path
 */
export async function collectTree(root: string, options: WalkOptions = {}): Promise<Map<string, TreeEntry>> {
  const entries = new Map<string, TreeEntry>();
  for await (const entry of walkTree(root, options)) {
    entries.set(entry.path, entry);
  }
  return entries;
}
