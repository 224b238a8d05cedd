/**
 * Per-project imports directory.
 *
 * <project>/.stashlink/imports/
 *   stashlink/__init__.py        python namespace: `from stashlink.<name> import ...`
 *   stashlink/<name> -> store    one symlink per package
 *   @stashlink/<name> -> store   javascript scope: `require('@stashlink/<name>')`
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { STASHLINK_DIRNAME } from './config.js';
import { FsOperationError, InvalidInputError, errnoCode, withFsContext } from './errors.js';
import { assertSafeRelativePath } from './hash.js';
import { logVerbose } from './logger.js';
import { removeDir } from './storeLayout.js';
import type { PackageLink, TargetLanguage } from './types.js';

const TAG = 'imports';

export const IMPORTS_DIRNAME = 'imports';
export const NAMESPACE = 'stashlink';
export const GITIGNORE_ENTRY = `${STASHLINK_DIRNAME}/`;

/**
 * Turn a package name into a Python identifier: `my-utils.v2` -> `my_utils_v2`
 */
export function normalizePythonName(name: string): string {
  let normalized = name.replace(/[-.]/g, '_');
  if (normalized.length > 0 && !/^[A-Za-z_]/.test(normalized)) {
    normalized = `_${normalized}`;
  }
  return normalized.replace(/[^A-Za-z0-9_]/g, '_');
}

function namespaceDirname(language: TargetLanguage): string {
  return language === 'python' ? NAMESPACE : `@${NAMESPACE}`;
}

function linkName(name: string, language: TargetLanguage): string {
  if (language === 'python') return normalizePythonName(name);
  if (name.includes('/') || name.includes('\\')) {
    throw new InvalidInputError(`package name must not contain path separators: ${name}`);
  }
  return name;
}

export class ImportsDirectory {
  readonly projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = path.resolve(projectRoot);
  }

  /** <project>/.stashlink */
  get stashDir(): string {
    return path.join(this.projectRoot, STASHLINK_DIRNAME);
  }

  /** <project>/.stashlink/imports */
  get importsDir(): string {
    return path.join(this.stashDir, IMPORTS_DIRNAME);
  }

  namespaceDir(language: TargetLanguage): string {
    return path.join(this.importsDir, namespaceDirname(language));
  }

  /**
   * Create the namespace subtree for a language (idempotent)
   */
  async setupNamespace(language: TargetLanguage): Promise<string> {
    const dir = this.namespaceDir(language);
    await withFsContext('mkdir', dir, () => fs.mkdir(dir, { recursive: true }));
    if (language === 'python') {
      const initPath = path.join(dir, '__init__.py');
      await withFsContext('write', initPath, () => fs.writeFile(initPath, ''));
    }
    return dir;
  }

  /**
   * Point `<namespace>/<name>` at a stored package's files root, replacing any existing link
   */
  async linkPackage(name: string, language: TargetLanguage, filesDir: string): Promise<string> {
    assertSafeRelativePath(name, 'package name');
    const dir = await this.setupNamespace(language);
    const linkPath = path.join(dir, linkName(name, language));
    const target = path.resolve(filesDir);

    await this.removeLink(linkPath);
    await withFsContext('link', linkPath, () =>
      fs.symlink(target, linkPath, process.platform === 'win32' ? 'junction' : 'dir')
    );
    logVerbose(TAG, `linked ${linkPath} -> ${target}`);
    return linkPath;
  }

  /**
   * @returns whether a link was removed
   */
  async unlinkPackage(name: string, language: TargetLanguage): Promise<boolean> {
    const linkPath = path.join(this.namespaceDir(language), linkName(name, language));
    return this.removeLink(linkPath);
  }

  async listLinks(): Promise<PackageLink[]> {
    const links: PackageLink[] = [];
    for (const language of ['python', 'javascript'] as const) {
      const dir = this.namespaceDir(language);
      let entries: string[];
      try {
        entries = await fs.readdir(dir);
      } catch (err) {
        if (errnoCode(err) === 'ENOENT') continue;
        throw new FsOperationError('list', dir, err);
      }
      for (const entry of entries.sort()) {
        const linkPath = path.join(dir, entry);
        let target: string;
        try {
          target = await fs.readlink(linkPath);
        } catch (err) {
          // __init__.py and anything else that is not a link
          if (errnoCode(err) === 'EINVAL') continue;
          throw new FsOperationError('read', linkPath, err);
        }
        links.push({ language, name: entry, linkPath, target });
      }
    }
    return links;
  }

  /**
   * Remove the whole imports tree (not the rest of .stashlink)
   */
  async clean(): Promise<void> {
    await removeDir(this.importsDir);
  }

  /**
   * Add `.stashlink/` to the project's .gitignore unless already listed
   * @returns whether the file was changed
   */
  async updateGitignore(): Promise<boolean> {
    const gitignorePath = path.join(this.projectRoot, '.gitignore');
    let content = '';
    try {
      content = await fs.readFile(gitignorePath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        throw new FsOperationError('read', gitignorePath, err);
      }
    }

    const lines = content.split(/\r?\n/).map((line) => line.trim());
    if (lines.includes(GITIGNORE_ENTRY) || lines.includes(STASHLINK_DIRNAME)) {
      return false;
    }

    const prefix = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
    await withFsContext('write', gitignorePath, () => fs.appendFile(gitignorePath, `${prefix}${GITIGNORE_ENTRY}\n`));
    return true;
  }

  private async removeLink(linkPath: string): Promise<boolean> {
    try {
      await fs.unlink(linkPath);
      return true;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw new FsOperationError('remove', linkPath, err);
    }
  }
}
