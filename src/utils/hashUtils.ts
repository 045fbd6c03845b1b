/**
 * @fileoverview File fingerprint utilities
 *
 * CONTENT MODE: size first, then streamed MD5 of both files (collisions only
 * cost a redundant copy)
 * METADATA MODE: size + modification time at whole-second resolution
 * USED BY: TreeDiff when a path is a file on both sides
 */
import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/**
 * How two files are judged identical
 */
export type CompareMode = 'content' | 'metadata';

export const COMPARE_MODES: readonly CompareMode[] = ['content', 'metadata'];

/**
 * Cheap per-file metadata gathered by the tree walker
 */
export interface FileFingerprint {
  size: number;
  mtimeMs: number;
}

/**
 * Stream a file through MD5 without loading it into memory
 *
 * @returns MD5 hash as 32-character hex string
 */
export async function computeFileMd5(filePath: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Compare two hashes for equality (case-insensitive)
 */
export function hashesEqual(hash1: string, hash2: string): boolean {
  return hash1.toLowerCase() === hash2.toLowerCase();
}

/**
 * Size and modification time agree. Times are compared in whole seconds,
 * the precision every common filesystem keeps.
 */
export function metadataMatches(a: FileFingerprint, b: FileFingerprint): boolean {
  return a.size === b.size && Math.floor(a.mtimeMs / 1000) === Math.floor(b.mtimeMs / 1000);
}

/**
 * Decide whether the replica file still matches the source file
 *
 * @param sourcePath - Absolute path of the source file
 * @param replicaPath - Absolute path of the replica file
 */
export async function filesMatch(
  mode: CompareMode,
  sourcePath: string,
  source: FileFingerprint,
  replicaPath: string,
  replica: FileFingerprint
): Promise<boolean> {
  if (source.size !== replica.size) {
    return false;
  }
  if (mode === 'metadata') {
    return metadataMatches(source, replica);
  }
  const [sourceHash, replicaHash] = await Promise.all([
    computeFileMd5(sourcePath),
    computeFileMd5(replicaPath)
  ]);
  return hashesEqual(sourceHash, replicaHash);
}
