/**
 * Import linker: registers a project's imports directory with a runtime
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { STASHLINK_DIRNAME } from './config.js';
import { FsOperationError, errnoCode, withFsContext } from './errors.js';
import { logVerbose } from './logger.js';
import type { EnvironmentDescriptor, GraftResult, UngraftResult } from './types.js';

const TAG = 'linker';

/** Path-configuration file written into site-packages */
export const PTH_FILENAME = 'stashlink.pth';

/** Tracking record, relative to the project's .stashlink directory */
export const PTH_LOCATION_FILENAME = '.pth-location';

/** Node.js preload script, relative to the project's .stashlink directory */
export const REGISTER_SCRIPT_FILENAME = 'register.cjs';

export function trackingFilePath(projectRoot: string): string {
  return path.join(projectRoot, STASHLINK_DIRNAME, PTH_LOCATION_FILENAME);
}

export function registerScriptPath(projectRoot: string): string {
  return path.join(projectRoot, STASHLINK_DIRNAME, REGISTER_SCRIPT_FILENAME);
}

async function readTrimmed(filePath: string): Promise<string | null> {
  try {
    return (await fs.readFile(filePath, 'utf-8')).trim();
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw new FsOperationError('read', filePath, err);
  }
}

async function removeIfPresent(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw new FsOperationError('remove', filePath, err);
  }
}

/**
 * Path-configuration file the project's tracking record names, if any
 */
export async function readGraftRecord(projectRoot: string): Promise<string | null> {
  const recorded = await readTrimmed(trackingFilePath(projectRoot));
  return recorded ? recorded : null;
}

/**
 * Write a .pth file naming `importsDir` into the descriptor's package
 * directory, and record where it went inside the project so `ungraft`
 * works without probing again.
 */
export async function graft(
  descriptor: EnvironmentDescriptor,
  importsDir: string,
  projectRoot: string
): Promise<GraftResult> {
  const absImportsDir = path.resolve(importsDir);
  const configFile = path.join(path.resolve(descriptor.packageDir), PTH_FILENAME);
  const trackingFile = trackingFilePath(path.resolve(projectRoot));

  // At most one registration per project
  const previous = await readGraftRecord(projectRoot);
  if (previous && previous !== configFile) {
    await removeIfPresent(previous);
    logVerbose(TAG, `removed previous graft ${previous}`);
  }

  // Tracking record before the config file
  await withFsContext('mkdir', path.dirname(trackingFile), () =>
    fs.mkdir(path.dirname(trackingFile), { recursive: true })
  );
  await withFsContext('write', trackingFile, () => fs.writeFile(trackingFile, `${configFile}\n`, { mode: 0o644 }));

  await withFsContext('write', configFile, () => fs.writeFile(configFile, `${absImportsDir}\n`, { mode: 0o644 }));

  logVerbose(TAG, `grafted ${absImportsDir} via ${configFile}`);
  return { configFile, trackingFile, importsDir: absImportsDir };
}

/**
 * Reverse `graft` using only the tracking record.
 * Missing record or missing config file are both fine; `removed` is only
 * set when a config file was actually deleted.
 */
export async function ungraft(projectRoot: string): Promise<UngraftResult> {
  const trackingFile = trackingFilePath(projectRoot);
  const configFile = await readGraftRecord(projectRoot);

  let removed: string | null = null;
  if (configFile && (await removeIfPresent(configFile))) {
    removed = configFile;
    logVerbose(TAG, `removed ${configFile}`);
  }
  await removeIfPresent(trackingFile);

  return { removed };
}

/**
 * Body of the Node.js preload script.
 * Prepends the imports directory to NODE_PATH and re-reads the module paths.
 */
export function renderRegisterScript(): string {
  return [
    '// Generated by stashlink. Preload with: node --require ./.stashlink/register.cjs',
    "'use strict';",
    "const path = require('path');",
    "const Module = require('module');",
    "const importsDir = path.join(__dirname, 'imports');",
    'const current = process.env.NODE_PATH;',
    'process.env.NODE_PATH = current ? importsDir + path.delimiter + current : importsDir;',
    'Module._initPaths();',
    '',
  ].join('\n');
}

export async function installRegisterScript(projectRoot: string): Promise<string> {
  const scriptPath = registerScriptPath(projectRoot);
  await withFsContext('mkdir', path.dirname(scriptPath), () => fs.mkdir(path.dirname(scriptPath), { recursive: true }));
  await withFsContext('write', scriptPath, () => fs.writeFile(scriptPath, renderRegisterScript(), { mode: 0o644 }));
  logVerbose(TAG, `wrote ${scriptPath}`);
  return scriptPath;
}

/**
 * @returns whether a script was removed
 */
export async function removeRegisterScript(projectRoot: string): Promise<boolean> {
  return removeIfPresent(registerScriptPath(projectRoot));
}
