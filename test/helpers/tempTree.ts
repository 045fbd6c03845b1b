/**
 * Temporary directory trees for filesystem tests
 */

import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';

/**
 * Tree description: a string is a file's content, an object a directory
 */
export interface TreeSpec {
  [name: string]: string | TreeSpec;
}

export async function makeTempDir(prefix = 'tree-mirror-test-'): Promise<string> {
  // realpath: macOS tmpdir is a symlink and validation returns real paths
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeTree(root: string, spec: TreeSpec): Promise<void> {
  await fs.mkdir(root, { recursive: true });
  for (const [name, value] of Object.entries(spec)) {
    const target = path.join(root, name);
    if (typeof value === 'string') {
      await fs.writeFile(target, value);
    } else {
      await writeTree(target, value);
    }
  }
}

/**
 * Read a tree back into a TreeSpec (symlinks and special files are left out)
 */
export async function readTree(root: string): Promise<TreeSpec> {
  const spec: TreeSpec = {};
  const dirents = await fs.readdir(root, { withFileTypes: true });
  for (const dirent of dirents) {
    const target = path.join(root, dirent.name);
    if (dirent.isDirectory()) {
      spec[dirent.name] = await readTree(target);
    } else if (dirent.isFile()) {
      spec[dirent.name] = await fs.readFile(target, 'utf-8');
    }
  }
  return spec;
}

export async function exists(p: string): Promise<boolean> {
  return fs.lstat(p).then(() => true, () => false);
}

/**
 * True when tests run as root, which can read and write regardless of mode bits
 */
export const runningAsRoot = process.getuid?.() === 0;
