/**
 * Centralized FileFilter utility for tree-mirror
 *
 * Single source of truth for exclusion decisions, applied to both trees so an
 * excluded path is neither copied into nor deleted from the replica.
 *
 * Sources of rules:
 * - excludePatterns: gitignore-style patterns from --exclude / config
 * - ignore file: `.mirrorignore` at the source root, re-read every pass
 * - alwaysExclude: exact relative paths (the log file when it sits in a tree)
 */

import { promises as fs } from 'fs';
import path from 'path';
import ignore, { type Ignore } from 'ignore';
import { errnoOf } from '../errors/mirrorErrors.js';
import { DEFAULT_IGNORE_FILE, isTempCopyName } from './fileFilter.patterns.js';

/**
 * Result of filtering a single path
 */
export interface FilterResult {
  /** Whether the path should be skipped/excluded */
  skip: boolean;
  /** Reason for skipping (if skip=true) */
  reason?: FilterReason;
}

/**
 * Reasons why a path may be filtered
 */
export type FilterReason =
  | 'always_excluded'
  | 'exclude_pattern'
  | 'ignore_file';

/**
 * Options for FileFilter configuration
 */
export interface FileFilterOptions {
  /** gitignore-style patterns to exclude */
  excludePatterns?: string[];
  /** Name of the ignore file at the source root; false disables it */
  ignoreFile?: string | false;
  /** Relative POSIX paths excluded unconditionally */
  alwaysExclude?: string[];
}

/**
 * FileFilter class for centralized exclusion logic
 *
 * Usage:
 * ```typescript
 * const filter = new FileFilter({ excludePatterns: ['node_modules/', '*.swp'] });
 * await filter.loadIgnoreFile(sourceDir);
 *
 * if (filter.shouldSkip('build', true)) {
 *   continue; // do not descend
 * }
 * ```
 */
export class FileFilter {
  private readonly excludePatterns: string[];
  private readonly ignoreFile: string | false;
  private readonly alwaysExclude: Set<string>;
  private readonly patternRules: Ignore;
  private ignoreFileRules: Ignore | null = null;

  constructor(options: FileFilterOptions = {}) {
    this.excludePatterns = (options.excludePatterns ?? []).filter(p => p.trim().length > 0);
    this.ignoreFile = options.ignoreFile ?? DEFAULT_IGNORE_FILE;
    this.alwaysExclude = new Set(options.alwaysExclude ?? []);
    this.patternRules = ignore().add(this.excludePatterns);
  }

  /**
   * Re-read the ignore file from a tree root. A missing file clears the rules.
   *
   * @returns Number of rule lines loaded
   */
  async loadIgnoreFile(root: string): Promise<number> {
    this.ignoreFileRules = null;
    if (this.ignoreFile === false) {
      return 0;
    }

    let content: string;
    try {
      content = await fs.readFile(path.join(root, this.ignoreFile), 'utf-8');
    } catch (error: unknown) {
      if (errnoOf(error) === 'ENOENT' || errnoOf(error) === 'EISDIR') {
        return 0;
      }
      throw error;
    }

    const lines = content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'));
    this.ignoreFileRules = ignore().add(lines);
    return lines.length;
  }

  /**
   * Get detailed filter result for a relative POSIX path
   *
   * @param relPath - Path relative to the tree root, `/`-separated
   * @param isDirectory - Directories are matched with a trailing slash so `build/` patterns apply
   */
  filter(relPath: string, isDirectory = false): FilterResult {
    // Interrupted copies must stay visible so the next pass removes them
    if (isTempCopyName(path.posix.basename(relPath))) {
      return { skip: false };
    }

    if (this.alwaysExclude.has(relPath)) {
      return { skip: true, reason: 'always_excluded' };
    }

    const candidate = isDirectory ? `${relPath}/` : relPath;

    if (this.excludePatterns.length > 0 && this.patternRules.ignores(candidate)) {
      return { skip: true, reason: 'exclude_pattern' };
    }

    if (this.ignoreFileRules?.ignores(candidate)) {
      return { skip: true, reason: 'ignore_file' };
    }

    return { skip: false };
  }

  /**
   * Check if a path should be skipped (excluded from both trees)
   */
  shouldSkip(relPath: string, isDirectory = false): boolean {
    return this.filter(relPath, isDirectory).skip;
  }

  /**
   * Exclusion patterns given on the command line or in the config file
   */
  getExcludePatterns(): readonly string[] {
    return this.excludePatterns;
  }
}
