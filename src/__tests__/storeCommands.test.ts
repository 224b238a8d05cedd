/**
 * put / ls / show / verify / rm command tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { InvalidInputError, NotFoundError, PackageStore, thawTree } from '@stashlink/core';
import { runList, runPut, runRemove, runShow, runVerify } from '../commands/store.js';

const H1 = '24bec2b423b4791083054003ebd8670870a17fc83c8bc086d0b3bd76f62eb5d8';

describe('store commands', () => {
  let testRoot: string;
  let pkgDir: string;
  let store: PackageStore;

  beforeEach(async () => {
    testRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'stashlink-cmd-test-'));
    pkgDir = path.join(testRoot, 'demo');
    await fs.mkdir(pkgDir);
    await fs.writeFile(path.join(pkgDir, 'a.x'), '1');
    await fs.writeFile(path.join(pkgDir, 'b.x'), '2');
    store = new PackageStore({ root: path.join(testRoot, 'store') });
  });

  afterEach(async () => {
    await thawTree(testRoot);
    await fs.rm(testRoot, { recursive: true, force: true });
  });

  describe('runPut', () => {
    it('should store the directory with its stashlink.json as the manifest', async () => {
      await fs.writeFile(path.join(pkgDir, 'stashlink.json'), '{}');

      const report = await runPut(store, pkgDir);

      expect(report).toEqual({ hash: H1, files: ['a.x', 'b.x'], alreadyStored: false, frozen: true });
    });

    it('should report a second put as already stored', async () => {
      await fs.writeFile(path.join(pkgDir, 'stashlink.json'), '{}');
      await runPut(store, pkgDir);

      const report = await runPut(store, pkgDir);

      expect(report.hash).toBe(H1);
      expect(report.alreadyStored).toBe(true);
    });

    it('should generate a manifest naming the directory', async () => {
      const report = await runPut(store, pkgDir, { freeze: false });

      expect(report.frozen).toBe(false);
      expect(await store.readManifest(report.hash)).toEqual({ name: 'demo' });
    });

    it('should take the manifest from an explicit file', async () => {
      const manifestPath = path.join(testRoot, 'manifest.json');
      await fs.writeFile(manifestPath, '{"name":"custom"}');

      const report = await runPut(store, pkgDir, { manifest: manifestPath });

      expect(await store.readManifest(report.hash)).toEqual({ name: 'custom' });
      expect(report.files).toEqual(['a.x', 'b.x']);
    });

    it('should fail on a missing explicit manifest', async () => {
      const missing = path.join(testRoot, 'nope.json');

      const result = runPut(store, pkgDir, { manifest: missing });

      await expect(result).rejects.toBeInstanceOf(InvalidInputError);
      await expect(result).rejects.toThrow(`manifest not found: ${missing}`);
    });

    it('should refuse a directory with nothing to store', async () => {
      const empty = path.join(testRoot, 'empty');
      await fs.mkdir(empty);

      await expect(runPut(store, empty)).rejects.toThrow(`no files to store in ${empty}`);
    });

    it('should honour extra ignore patterns', async () => {
      await fs.writeFile(path.join(pkgDir, 'notes.log'), 'x');

      const report = await runPut(store, pkgDir, { ignore: ['*.log'] });

      expect(report.files).toEqual(['a.x', 'b.x']);
    });
  });

  describe('inspection and removal', () => {
    beforeEach(async () => {
      await fs.writeFile(path.join(pkgDir, 'stashlink.json'), '{}');
      await runPut(store, pkgDir);
    });

    it('should list stored hashes', async () => {
      expect(await runList(store)).toEqual([H1]);
    });

    it('should show files and manifest', async () => {
      const shown = await runShow(store, `sha256:${H1}`);

      expect(shown.pkg.hash).toBe(H1);
      expect(shown.files).toEqual(['a.x', 'b.x']);
      expect(shown.manifest).toEqual({});
    });

    it('should verify an intact package', async () => {
      expect(await runVerify(store, H1)).toBe(H1);
    });

    it('should remove a frozen package', async () => {
      expect(await runRemove(store, H1)).toBe(H1);
      expect(await runList(store)).toEqual([]);
      await expect(runShow(store, H1)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
