/**
 * Content hashing for stored packages
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { InvalidInputError, withFsContext } from './errors.js';

/** Label fed to the digest ahead of the manifest bytes */
export const MANIFEST_SENTINEL = '__manifest__';

/** Integrity prefix used in lock records */
export const INTEGRITY_PREFIX = 'sha256:';

const NUL = Buffer.from([0]);
const HASH_PATTERN = /^[a-f0-9]{64}$/;

export function assertSafeRelativePath(value: string, name = 'file path'): string {
  if (!value.trim()) {
    throw new InvalidInputError(`${name} must be a non-empty relative path`);
  }
  if (value.includes('\0')) {
    throw new InvalidInputError(`${name} must not contain null bytes: ${JSON.stringify(value)}`);
  }
  if (path.isAbsolute(value) || path.posix.isAbsolute(value) || path.win32.isAbsolute(value)) {
    throw new InvalidInputError(`${name} must be a relative path: ${value}`);
  }
  const segments = value.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..')) {
    throw new InvalidInputError(`${name} must not contain ".." segments: ${value}`);
  }
  return value;
}

/**
 * Strip an optional `sha256:` prefix and lower-case
 */
export function normalizeHash(hash: string): string {
  const trimmed = hash.trim().toLowerCase();
  return trimmed.startsWith(INTEGRITY_PREFIX) ? trimmed.slice(INTEGRITY_PREFIX.length) : trimmed;
}

export function isValidHash(hash: string): boolean {
  return HASH_PATTERN.test(normalizeHash(hash));
}

/**
 * Normalize and validate, throwing on anything that is not a sha256 hex digest
 */
export function parseHash(hash: string): string {
  const normalized = normalizeHash(hash);
  if (!HASH_PATTERN.test(normalized)) {
    throw new InvalidInputError(`not a sha256 hash: ${hash}`);
  }
  return normalized;
}

export function toIntegrity(hash: string): string {
  return `${INTEGRITY_PREFIX}${normalizeHash(hash)}`;
}

/**
 * Get shard (first 2 characters of hash)
 */
export function getShard(hash: string): string {
  return hash.slice(0, 2);
}

/**
 * Order paths by their UTF-8 bytes, so the result does not depend on
 * UTF-16 code unit ordering.
 */
export function sortPaths(files: readonly string[]): string[] {
  return [...files].sort((a, b) => Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8')));
}

/**
 * Compute the package hash.
 *
 * For every file in sorted order the digest takes the relative path, a NUL,
 * the file bytes and another NUL; then the sentinel label, a NUL and the raw
 * manifest bytes. Paths are hashed exactly as given.
 */
export async function computeContentHash(
  sourceDir: string,
  files: readonly string[],
  manifest: Uint8Array | string
): Promise<string> {
  const h = createHash('sha256');

  for (const file of sortPaths(files)) {
    assertSafeRelativePath(file);
    const filePath = path.join(sourceDir, file);
    const content = await withFsContext('read', filePath, () => fs.readFile(filePath));
    h.update(Buffer.from(file, 'utf8'));
    h.update(NUL);
    h.update(content);
    h.update(NUL);
  }

  h.update(MANIFEST_SENTINEL);
  h.update(NUL);
  h.update(typeof manifest === 'string' ? Buffer.from(manifest, 'utf8') : manifest);

  return h.digest('hex');
}
