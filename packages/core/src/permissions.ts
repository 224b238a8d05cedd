/**
 * Permission-bit freezing for stored trees.
 *
 * Not a security boundary: the owner can always chmod back. On platforms
 * without POSIX permission bits both operations are no-ops.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { withFsContext } from './errors.js';

export const FROZEN_FILE_MODE = 0o444;
export const FROZEN_DIR_MODE = 0o555;
export const THAWED_DIR_MODE = 0o755;

export function supportsPosixPermissions(platform: NodeJS.Platform = process.platform): boolean {
  return platform !== 'win32';
}

interface WalkModes {
  file?: number;
  dir: number;
}

async function applyModes(root: string, modes: WalkModes): Promise<void> {
  const stack = [root];

  while (stack.length) {
    const current = stack.pop();
    if (current === undefined) continue;

    // 0555 still allows listing and traversal
    const dirents = await withFsContext('list', current, () => fs.readdir(current, { withFileTypes: true }));
    await withFsContext('chmod', current, () => fs.chmod(current, modes.dir));

    for (const dirent of dirents) {
      const fullPath = path.join(current, dirent.name);
      if (dirent.isDirectory()) {
        stack.push(fullPath);
      } else if (dirent.isFile() && modes.file !== undefined) {
        const fileMode = modes.file;
        await withFsContext('chmod', fullPath, () => fs.chmod(fullPath, fileMode));
      }
      // symlinks are left alone: chmod would follow them out of the tree
    }
  }
}

/**
 * Make files 0444 and directories 0555 under `root` (inclusive)
 */
export async function freezeTree(root: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  if (!supportsPosixPermissions(platform)) return;
  await applyModes(root, { file: FROZEN_FILE_MODE, dir: FROZEN_DIR_MODE });
}

/**
 * Give directories back owner write so the tree can be removed.
 * File modes are left as they are; unlinking only needs the parent writable.
 */
export async function thawTree(root: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  if (!supportsPosixPermissions(platform)) return;
  await applyModes(root, { dir: THAWED_DIR_MODE });
}
