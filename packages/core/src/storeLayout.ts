/**
 * On-disk layout of the package store
 */

import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { errnoCode, withFsContext } from './errors.js';
import { getShard } from './hash.js';

/** Algorithm directory directly under the store root */
export const HASH_ALGORITHM_DIRNAME = 'sha256';

/** Directory holding the stored file tree */
export const FILES_DIRNAME = 'files';

/** Manifest filename inside a stored package */
export const MANIFEST_FILENAME = 'stashlink.json';

/** Prefix of staging directories; never a valid hash */
export const TEMP_PREFIX = '.tmp-';

/**
 * Build package directory path: <root>/sha256/<shard>/<hash>
 */
export function buildPackagePath(root: string, hash: string): string {
  return path.join(root, HASH_ALGORITHM_DIRNAME, getShard(hash), hash);
}

/**
 * Build staging path (sibling of the final package path, so rename stays on one filesystem)
 */
export function buildTempPath(root: string, hash: string): string {
  const random = randomBytes(4).toString('hex');
  return path.join(root, HASH_ALGORITHM_DIRNAME, getShard(hash), `${TEMP_PREFIX}${hash}-${random}`);
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch (err) {
    if (errnoCode(err) === 'ENOENT' || errnoCode(err) === 'ENOTDIR') return false;
    throw err;
  }
}

/**
 * Rename staging dir into place
 * @returns true if rename succeeds, false if target already exists
 */
export async function atomicRename(tempPath: string, targetPath: string): Promise<boolean> {
  try {
    await fs.rename(tempPath, targetPath);
    return true;
  } catch (err: unknown) {
    // EEXIST or ENOTEMPTY means target already exists
    const code = errnoCode(err);
    if (code === 'EEXIST' || code === 'ENOTEMPTY') {
      return false;
    }
    throw err;
  }
}

/**
 * Recursively delete directory; a missing directory is not an error
 */
export async function removeDir(dirPath: string): Promise<void> {
  await withFsContext('remove', dirPath, () => fs.rm(dirPath, { recursive: true, force: true }));
}

/**
 * Copy one file, keeping its permission bits
 */
export async function copyFilePreservingMode(src: string, dst: string): Promise<void> {
  const stat = await withFsContext('read', src, () => fs.stat(src));
  await withFsContext('mkdir', path.dirname(dst), () => fs.mkdir(path.dirname(dst), { recursive: true }));
  await withFsContext('copy', dst, () => fs.copyFile(src, dst));
  await withFsContext('chmod', dst, () => fs.chmod(dst, stat.mode & 0o7777));
}

/**
 * Relative POSIX paths of every regular file (and symlink) under root, sorted
 */
export async function walkFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const stack: string[] = [''];

  while (stack.length) {
    const rel = stack.pop();
    if (rel === undefined) continue;
    const abs = path.join(root, rel);
    const dirents = await withFsContext('list', abs, () => fs.readdir(abs, { withFileTypes: true }));
    for (const dirent of dirents) {
      const childRel = rel ? `${rel}/${dirent.name}` : dirent.name;
      if (dirent.isDirectory()) {
        stack.push(childRel);
      } else {
        files.push(childRel);
      }
    }
  }

  return files.sort();
}
