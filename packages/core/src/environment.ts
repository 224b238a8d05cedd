/**
 * Probe for the active Python environment's site-packages directory
 */

import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import { glob } from 'glob';
import { EnvironmentDiscoveryError } from './errors.js';
import { logVerbose } from './logger.js';
import type { EnvironmentDescriptor } from './types.js';

const execFileAsync = promisify(execFile);

const TAG = 'environment';

/** Prints the interpreter's pure-Python install directory */
export const PURELIB_QUERY = "import sysconfig; print(sysconfig.get_path('purelib'))";

/** site-packages locations relative to a virtualenv root (POSIX, then Windows) */
export const VENV_SITE_PACKAGES_PATTERNS = ['lib/python*/site-packages', 'Lib/site-packages'];

/**
 * Runs `interpreter` with `args` and resolves its stdout
 */
export type InterpreterQuery = (interpreter: string, args: readonly string[]) => Promise<string>;

export interface ProbeOptions {
  /** Process environment to read VIRTUAL_ENV from, defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Interpreter for the system fallback, defaults to python3 */
  interpreter?: string;
  /** Replaces running the interpreter, for tests */
  queryInterpreter?: InterpreterQuery;
}

const runInterpreter: InterpreterQuery = async (interpreter, args) => {
  const { stdout } = await execFileAsync(interpreter, [...args], { encoding: 'utf8' });
  return stdout;
};

async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find site-packages inside a virtualenv.
 * No match is a hard failure; there is no fallback to the system interpreter.
 */
export async function findVenvSitePackages(venvRoot: string): Promise<string> {
  const matches = await glob(VENV_SITE_PACKAGES_PATTERNS, {
    cwd: venvRoot,
    absolute: true,
    // directories come back with a trailing separator
    mark: true,
  });
  const dirs = matches
    .filter((m) => m.endsWith('/') || m.endsWith(path.sep))
    .map((m) => m.replace(/[\\/]+$/, ''))
    .sort();

  const sitePackages = dirs[0];
  if (sitePackages === undefined) {
    throw new EnvironmentDiscoveryError(
      'python',
      'no-environment',
      `no site-packages found in virtualenv ${venvRoot}`,
      `recreate the virtualenv (python3 -m venv ${venvRoot}) or deactivate it`
    );
  }
  return sitePackages;
}

/**
 * Ask the interpreter for its purelib directory and check that it exists
 */
export async function findSystemSitePackages(
  interpreter: string,
  queryInterpreter: InterpreterQuery = runInterpreter
): Promise<string> {
  let output: string;
  try {
    output = await queryInterpreter(interpreter, ['-c', PURELIB_QUERY]);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new EnvironmentDiscoveryError(
      'python',
      'no-runtime',
      `${interpreter} not found or failed: ${detail}`,
      `install ${interpreter} or activate a virtualenv`,
      { cause: err }
    );
  }

  const sitePackages = output.trim();
  if (!sitePackages) {
    throw new EnvironmentDiscoveryError(
      'python',
      'no-runtime',
      `${interpreter} returned an empty site-packages path`,
      'activate a virtualenv'
    );
  }

  if (!(await directoryExists(sitePackages))) {
    throw new EnvironmentDiscoveryError(
      'python',
      'missing-package-dir',
      `site-packages directory does not exist: ${sitePackages}`,
      `create it or activate a virtualenv`
    );
  }

  return sitePackages;
}

/**
 * Locate the environment to graft into: the active virtualenv if any,
 * otherwise whatever the interpreter reports.
 */
export async function probePythonEnvironment(options: ProbeOptions = {}): Promise<EnvironmentDescriptor> {
  const env = options.env ?? process.env;
  const venv = env['VIRTUAL_ENV'];

  if (venv) {
    const root = path.resolve(venv);
    const packageDir = await findVenvSitePackages(root);
    logVerbose(TAG, `virtualenv site-packages: ${packageDir}`);
    return { language: 'python', source: 'virtualenv', root, packageDir };
  }

  const interpreter = options.interpreter ?? 'python3';
  const packageDir = await findSystemSitePackages(interpreter, options.queryInterpreter);
  logVerbose(TAG, `system site-packages (${interpreter}): ${packageDir}`);
  return { language: 'python', source: 'system', root: interpreter, packageDir };
}
