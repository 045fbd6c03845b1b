/**
 * Startup validation of the source and replica roots
 *
 * Runs before the first pass. A replica equal to, inside of, or containing
 * the source would make a pass copy into or delete its own input.
 */

import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { PathNotFoundError, PathValidationError, errnoOf } from '../errors/mirrorErrors.js';
import { isProtectedPath, resolveUserPath } from './pathExpansion.js';
import { log, type Logger } from './logger.js';

export interface ResolvedRoots {
  sourceDir: string;
  replicaDir: string;
  /** True when the replica did not exist and was created */
  replicaCreated: boolean;
}

export interface ValidateRootsOptions {
  /** Create a missing replica directory (default: true) */
  createReplica?: boolean;
  cwd?: string;
  logger?: Logger;
}

/**
 * True iff child is strictly below parent. Both must be absolute.
 */
export function isSubdirectory(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

function assertDistinct(sourceDir: string, replicaDir: string): void {
  if (sourceDir === replicaDir) {
    throw new PathValidationError('identical', replicaDir);
  }
  if (isSubdirectory(sourceDir, replicaDir)) {
    throw new PathValidationError('replica_inside_source', replicaDir, sourceDir);
  }
  if (isSubdirectory(replicaDir, sourceDir)) {
    throw new PathValidationError('source_inside_replica', replicaDir, sourceDir);
  }
}

async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.stat(p);
  } catch (error: unknown) {
    if (errnoOf(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Validate source and replica roots, creating the replica if allowed
 *
 * @throws PathNotFoundError if the source (or, without createReplica, the replica) is missing
 * @throws PathValidationError for identical, nested, non-directory or protected roots
 */
export async function validateSyncRoots(
  source: string,
  replica: string,
  options: ValidateRootsOptions = {}
): Promise<ResolvedRoots> {
  const { createReplica = true, cwd, logger = log } = options;

  const sourceDir = resolveUserPath(source, cwd);
  const replicaDir = resolveUserPath(replica, cwd);

  // Lexical check first so nothing is created for an invalid pair
  assertDistinct(sourceDir, replicaDir);
  if (isProtectedPath(replicaDir)) {
    throw new PathValidationError('protected_location', replicaDir);
  }

  const sourceStat = await statOrNull(sourceDir);
  if (!sourceStat) {
    throw new PathNotFoundError(sourceDir, 'source');
  }
  if (!sourceStat.isDirectory()) {
    throw new PathValidationError('not_a_directory', sourceDir);
  }

  // Topmost directory created here, so a rejected pair leaves no parents behind
  let createdFrom: string | undefined;
  const replicaStat = await statOrNull(replicaDir);
  if (!replicaStat) {
    if (!createReplica) {
      throw new PathNotFoundError(replicaDir, 'replica');
    }
    createdFrom = await fs.mkdir(replicaDir, { recursive: true });
    logger.info(`[VALIDATE] Created replica directory ${replicaDir}`);
  } else if (!replicaStat.isDirectory()) {
    throw new PathValidationError('not_a_directory', replicaDir);
  }

  // Symlinked aliases can hide nesting from the lexical check
  const realSource = await fs.realpath(sourceDir);
  const realReplica = await fs.realpath(replicaDir);
  try {
    assertDistinct(realSource, realReplica);
    if (isProtectedPath(realReplica)) {
      throw new PathValidationError('protected_location', realReplica);
    }
  } catch (error) {
    if (createdFrom) {
      await fs.rm(createdFrom, { recursive: true });
    }
    throw error;
  }

  logger.debug(`[VALIDATE] source=${realSource} replica=${realReplica}`);

  return {
    sourceDir: realSource,
    replicaDir: realReplica,
    replicaCreated: createdFrom !== undefined
  };
}
