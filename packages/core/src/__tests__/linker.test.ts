/**
 * Import linker tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  PTH_FILENAME,
  graft,
  installRegisterScript,
  readGraftRecord,
  registerScriptPath,
  removeRegisterScript,
  renderRegisterScript,
  trackingFilePath,
  ungraft,
} from '../linker.js';
import type { EnvironmentDescriptor } from '../types.js';

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

describe('linker', () => {
  let root: string;
  let project: string;
  let importsDir: string;
  let sitePackages: string;
  let descriptor: EnvironmentDescriptor;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'stashlink-linker-test-'));
    project = path.join(root, 'project');
    importsDir = path.join(project, '.stashlink', 'imports');
    sitePackages = path.join(root, 'venv', 'lib', 'python3.11', 'site-packages');
    await fs.mkdir(importsDir, { recursive: true });
    await fs.mkdir(sitePackages, { recursive: true });
    await fs.writeFile(path.join(sitePackages, 'other.pth'), '/somewhere/else\n');
    descriptor = { language: 'python', source: 'virtualenv', root: path.join(root, 'venv'), packageDir: sitePackages };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('graft', () => {
    it('should write the absolute imports directory as the only line', async () => {
      const result = await graft(descriptor, importsDir, project);

      const configFile = path.join(sitePackages, PTH_FILENAME);
      expect(result).toEqual({
        configFile,
        trackingFile: path.join(project, '.stashlink', '.pth-location'),
        importsDir,
      });
      expect(await fs.readFile(configFile, 'utf-8')).toBe(`${importsDir}\n`);
    });

    it('should record where the config file went', async () => {
      await graft(descriptor, importsDir, project);

      expect(await fs.readFile(trackingFilePath(project), 'utf-8')).toBe(
        `${path.join(sitePackages, PTH_FILENAME)}\n`
      );
      expect(await readGraftRecord(project)).toBe(path.join(sitePackages, PTH_FILENAME));
    });

    it('should not duplicate the entry when run twice', async () => {
      await graft(descriptor, importsDir, project);
      await graft(descriptor, importsDir, project);

      expect(await fs.readFile(path.join(sitePackages, PTH_FILENAME), 'utf-8')).toBe(`${importsDir}\n`);
    });

    it('should remove the previous environment graft when switching environments', async () => {
      const otherSitePackages = path.join(root, 'venv2', 'lib', 'python3.12', 'site-packages');
      await fs.mkdir(otherSitePackages, { recursive: true });
      await graft(descriptor, importsDir, project);

      await graft({ ...descriptor, packageDir: otherSitePackages }, importsDir, project);

      expect(await exists(path.join(sitePackages, PTH_FILENAME))).toBe(false);
      expect(await fs.readFile(path.join(otherSitePackages, PTH_FILENAME), 'utf-8')).toBe(`${importsDir}\n`);
      expect(await readGraftRecord(project)).toBe(path.join(otherSitePackages, PTH_FILENAME));
    });

    it('should fail with a filesystem error when site-packages is gone', async () => {
      await fs.rm(sitePackages, { recursive: true });

      await expect(graft(descriptor, importsDir, project)).rejects.toMatchObject({
        code: 'io',
        operation: 'write',
        path: path.join(sitePackages, PTH_FILENAME),
      });
    });
  });

  describe('ungraft', () => {
    it('should restore site-packages to its prior contents', async () => {
      const before = await fs.readdir(sitePackages);
      await graft(descriptor, importsDir, project);

      const result = await ungraft(project);

      expect(result).toEqual({ removed: path.join(sitePackages, PTH_FILENAME) });
      expect(await fs.readdir(sitePackages)).toEqual(before);
      expect(await exists(trackingFilePath(project))).toBe(false);
    });

    it('should be a no-op without a record', async () => {
      expect(await ungraft(project)).toEqual({ removed: null });
    });

    it('should be safe to run twice', async () => {
      await graft(descriptor, importsDir, project);
      await ungraft(project);

      expect(await ungraft(project)).toEqual({ removed: null });
    });

    it('should drop the record when the config file was already deleted', async () => {
      await graft(descriptor, importsDir, project);
      await fs.rm(path.join(sitePackages, PTH_FILENAME));

      const result = await ungraft(project);

      expect(result).toEqual({ removed: null });
      expect(await exists(trackingFilePath(project))).toBe(false);
    });

    it('should not need the environment to be active', async () => {
      await graft(descriptor, importsDir, project);

      // nothing environment-related is passed to ungraft
      const { removed } = await ungraft(project);

      expect(removed).toBe(path.join(sitePackages, PTH_FILENAME));
      expect(await exists(path.join(sitePackages, PTH_FILENAME))).toBe(false);
    });
  });

  describe('register script', () => {
    it('should prepend the imports directory to NODE_PATH', () => {
      const script = renderRegisterScript();

      expect(script.split('\n')).toContain("const importsDir = path.join(__dirname, 'imports');");
      expect(script.split('\n')).toContain(
        'process.env.NODE_PATH = current ? importsDir + path.delimiter + current : importsDir;'
      );
      expect(script.endsWith('Module._initPaths();\n')).toBe(true);
    });

    it('should install and remove the script', async () => {
      const scriptPath = await installRegisterScript(project);

      expect(scriptPath).toBe(path.join(project, '.stashlink', 'register.cjs'));
      expect(scriptPath).toBe(registerScriptPath(project));
      expect(await fs.readFile(scriptPath, 'utf-8')).toBe(renderRegisterScript());

      expect(await removeRegisterScript(project)).toBe(true);
      expect(await removeRegisterScript(project)).toBe(false);
    });
  });
});
