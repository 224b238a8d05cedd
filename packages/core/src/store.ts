/**
 * PackageStore - content-addressed store of immutable file sets
 *
 * A package is addressed by the hash of its file paths, file bytes and
 * manifest bytes. Its location is a pure function of that hash, so there is
 * no index. Packages are only ever removed by `delete`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { IntegrityError, InvalidInputError, NotFoundError, withFsContext } from './errors.js';
import { assertSafeRelativePath, computeContentHash, getShard, isValidHash, parseHash } from './hash.js';
import { logVerbose, logWarn } from './logger.js';
import { freezeTree, thawTree } from './permissions.js';
import {
  FILES_DIRNAME,
  HASH_ALGORITHM_DIRNAME,
  MANIFEST_FILENAME,
  TEMP_PREFIX,
  atomicRename,
  buildPackagePath,
  buildTempPath,
  copyFilePreservingMode,
  isDirectory,
  removeDir,
  walkFiles,
} from './storeLayout.js';
import type { PackageStoreOptions, PutResult, StoredPackage } from './types.js';

const TAG = 'store';

const ManifestObjectSchema = z.record(z.string(), z.unknown());

/**
 * Paths must be spelled the way `walkFiles` reports them, once each;
 * otherwise `verify` could not reproduce the hash.
 */
function assertCanonicalFileList(files: readonly string[]): void {
  const seen = new Set<string>();
  for (const file of files) {
    assertSafeRelativePath(file);
    if (path.posix.normalize(file) !== file || file.endsWith('/')) {
      throw new InvalidInputError(`file path is not in canonical form: ${file}`);
    }
    if (seen.has(file)) {
      throw new InvalidInputError(`duplicate file path: ${file}`);
    }
    seen.add(file);
  }
}

export class PackageStore {
  private readonly root: string;
  private readonly platform: NodeJS.Platform;

  constructor(options: PackageStoreOptions = {}) {
    this.root = path.resolve(options.root ?? loadConfig().storeRoot);
    this.platform = options.platform ?? process.platform;
  }

  get rootDir(): string {
    return this.root;
  }

  /**
   * Package directory for a hash (accepts the `sha256:` integrity form)
   */
  getPath(hash: string): string {
    return buildPackagePath(this.root, parseHash(hash));
  }

  /**
   * Whether a committed package exists; a malformed hash is simply absent
   */
  async exists(hash: string): Promise<boolean> {
    if (!isValidHash(hash)) return false;
    return isDirectory(this.getPath(hash));
  }

  /**
   * Store `files` (relative to `sourceDir`) together with the manifest blob.
   * Returns the package hash; storing the same content again writes nothing.
   */
  async put(sourceDir: string, files: readonly string[], manifest: Uint8Array | string): Promise<string> {
    const { hash } = await this.commit(sourceDir, files, manifest);
    return hash;
  }

  /**
   * Same as `put`, also reporting whether this call wrote the package
   */
  async commit(sourceDir: string, files: readonly string[], manifest: Uint8Array | string): Promise<PutResult> {
    assertCanonicalFileList(files);

    const hash = await computeContentHash(sourceDir, files, manifest);
    const packagePath = buildPackagePath(this.root, hash);

    if (await isDirectory(packagePath)) {
      logVerbose(TAG, `already stored: ${hash}`);
      return { hash, created: false };
    }

    const tempPath = buildTempPath(this.root, hash);
    const tempFilesDir = path.join(tempPath, FILES_DIRNAME);
    let created = false;

    try {
      await withFsContext('mkdir', tempFilesDir, () => fs.mkdir(tempFilesDir, { recursive: true }));

      for (const file of files) {
        await copyFilePreservingMode(path.join(sourceDir, file), path.join(tempFilesDir, file));
      }

      const manifestPath = path.join(tempPath, MANIFEST_FILENAME);
      await withFsContext('write', manifestPath, () => fs.writeFile(manifestPath, manifest, { mode: 0o644 }));

      created = await withFsContext('rename', packagePath, () => atomicRename(tempPath, packagePath));
      if (!created) {
        // An identical package was committed meanwhile; keep that one
        logVerbose(TAG, `lost commit race for ${hash}, discarding staged copy`);
        await removeDir(tempPath);
      }
    } catch (err) {
      await removeDir(tempPath).catch((cleanupErr: unknown) => {
        logWarn(TAG, `failed to remove staging directory ${tempPath}`, cleanupErr);
      });
      throw err;
    }

    if (created) {
      logVerbose(TAG, `stored ${hash} (${files.length} files)`);
    }
    return { hash, created };
  }

  async get(hash: string): Promise<StoredPackage> {
    const normalized = parseHash(hash);
    const packagePath = buildPackagePath(this.root, normalized);
    if (!(await isDirectory(packagePath))) {
      throw new NotFoundError(normalized);
    }
    return {
      hash: normalized,
      path: packagePath,
      filesDir: path.join(packagePath, FILES_DIRNAME),
      manifestPath: path.join(packagePath, MANIFEST_FILENAME),
    };
  }

  /**
   * Strip write permission from the stored file tree (no-op without POSIX permissions)
   */
  async freeze(hash: string): Promise<void> {
    const pkg = await this.get(hash);
    await freezeTree(pkg.filesDir, this.platform);
    logVerbose(TAG, `froze ${pkg.hash}`);
  }

  async listFiles(hash: string): Promise<string[]> {
    const pkg = await this.get(hash);
    return walkFiles(pkg.filesDir);
  }

  /**
   * Every committed hash in the store, sorted
   */
  async list(): Promise<string[]> {
    const algoDir = path.join(this.root, HASH_ALGORITHM_DIRNAME);
    if (!(await isDirectory(algoDir))) {
      return [];
    }

    const hashes: string[] = [];
    const shards = await withFsContext('list', algoDir, () => fs.readdir(algoDir, { withFileTypes: true }));
    for (const shard of shards) {
      if (!shard.isDirectory()) continue;
      const shardPath = path.join(algoDir, shard.name);
      const entries = await withFsContext('list', shardPath, () => fs.readdir(shardPath, { withFileTypes: true }));
      for (const entry of entries) {
        // Staging dirs may linger after a crash
        if (!entry.isDirectory() || entry.name.startsWith(TEMP_PREFIX)) continue;
        if (getShard(entry.name) !== shard.name) continue;
        hashes.push(entry.name);
      }
    }
    return hashes.sort();
  }

  async readManifestBytes(hash: string): Promise<Buffer> {
    const pkg = await this.get(hash);
    return withFsContext('read', pkg.manifestPath, () => fs.readFile(pkg.manifestPath));
  }

  /**
   * Parse the stored manifest as a JSON object
   */
  async readManifest(hash: string): Promise<Record<string, unknown>> {
    const pkg = await this.get(hash);
    const content = await withFsContext('read', pkg.manifestPath, () => fs.readFile(pkg.manifestPath, 'utf-8'));
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InvalidInputError(`Failed to parse manifest at ${pkg.manifestPath}: ${message}`);
    }
    const result = ManifestObjectSchema.safeParse(parsed);
    if (!result.success) {
      throw new InvalidInputError(`manifest at ${pkg.manifestPath} is not a JSON object`);
    }
    return result.data;
  }

  /**
   * Recompute the hash from what is on disk.
   * Throws IntegrityError if the stored content no longer matches its address.
   */
  async verify(hash: string): Promise<void> {
    const pkg = await this.get(hash);
    const files = await walkFiles(pkg.filesDir);
    const manifest = await withFsContext('read', pkg.manifestPath, () => fs.readFile(pkg.manifestPath));
    const actual = await computeContentHash(pkg.filesDir, files, manifest);
    if (actual !== pkg.hash) {
      throw new IntegrityError(pkg.hash, actual);
    }
  }

  async delete(hash: string): Promise<void> {
    const pkg = await this.get(hash);
    await thawTree(pkg.filesDir, this.platform);
    await removeDir(pkg.path);
    logVerbose(TAG, `deleted ${pkg.hash}`);
  }
}
