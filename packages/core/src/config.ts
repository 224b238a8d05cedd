/**
 * Runtime configuration, read from the environment
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

/** Name of the per-user home directory and the per-project directory */
export const STASHLINK_DIRNAME = '.stashlink';

const nonEmpty = z.string().trim().min(1, 'must not be empty');

const ConfigSchema = z.object({
  home: nonEmpty,
  storeRoot: nonEmpty.optional(),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  pythonInterpreter: nonEmpty.default('python3'),
});

export interface StashlinkConfig {
  readonly home: string;
  readonly storeRoot: string;
  readonly logLevel: z.infer<typeof ConfigSchema>['logLevel'];
  readonly pythonInterpreter: string;
}

export class ConfigError extends InvalidInputError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const ENV_KEYS: Record<keyof z.input<typeof ConfigSchema>, string> = {
  home: 'STASHLINK_HOME',
  storeRoot: 'STASHLINK_STORE',
  logLevel: 'STASHLINK_LOG_LEVEL',
  pythonInterpreter: 'STASHLINK_PYTHON',
};

function isConfigKey(key: unknown): key is keyof typeof ENV_KEYS {
  return typeof key === 'string' && Object.prototype.hasOwnProperty.call(ENV_KEYS, key);
}

export function defaultHome(): string {
  return path.join(os.homedir(), STASHLINK_DIRNAME);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StashlinkConfig {
  const parsed = ConfigSchema.safeParse({
    home: env[ENV_KEYS.home] ?? defaultHome(),
    storeRoot: env[ENV_KEYS.storeRoot],
    logLevel: env[ENV_KEYS.logLevel],
    pythonInterpreter: env[ENV_KEYS.pythonInterpreter],
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path[0];
      const envName = isConfigKey(key) ? ENV_KEYS[key] : String(key);
      return `${envName}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  const { home, storeRoot, logLevel, pythonInterpreter } = parsed.data;
  const resolvedHome = path.resolve(home);
  return Object.freeze({
    home: resolvedHome,
    storeRoot: path.resolve(storeRoot ?? path.join(resolvedHome, 'store')),
    logLevel,
    pythonInterpreter,
  });
}
