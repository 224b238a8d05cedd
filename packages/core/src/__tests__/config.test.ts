/**
 * Configuration, logging and error helper tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, loadConfig } from '../config.js';
import { NotFoundError, FsOperationError, errnoCode, isStashlinkError, withFsContext } from '../errors.js';
import { getLogLevel, isLogLevel, logError, logInfo, logVerbose, logWarn, setLogLevel } from '../logger.js';

describe('loadConfig', () => {
  it('should default to ~/.stashlink', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      home: path.join(os.homedir(), '.stashlink'),
      storeRoot: path.join(os.homedir(), '.stashlink', 'store'),
      logLevel: 'info',
      pythonInterpreter: 'python3',
    });
  });

  it('should put the store under STASHLINK_HOME', () => {
    const config = loadConfig({ STASHLINK_HOME: '/srv/stash' });

    expect(config.home).toBe(path.resolve('/srv/stash'));
    expect(config.storeRoot).toBe(path.resolve('/srv/stash/store'));
  });

  it('should let STASHLINK_STORE override the store root', () => {
    const config = loadConfig({ STASHLINK_HOME: '/srv/stash', STASHLINK_STORE: '/mnt/cas' });

    expect(config.storeRoot).toBe(path.resolve('/mnt/cas'));
  });

  it('should read the log level and interpreter', () => {
    const config = loadConfig({ STASHLINK_LOG_LEVEL: 'verbose', STASHLINK_PYTHON: 'python3.12' });

    expect(config.logLevel).toBe('verbose');
    expect(config.pythonInterpreter).toBe('python3.12');
  });

  it('should name the offending variable', () => {
    let caught: unknown;
    try {
      loadConfig({ STASHLINK_LOG_LEVEL: 'loud', STASHLINK_PYTHON: ' ' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(isStashlinkError(caught, 'invalid_input')).toBe(true);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]?.startsWith('STASHLINK_LOG_LEVEL: ')).toBe(true);
    expect(issues[1]).toBe('STASHLINK_PYTHON: must not be empty');
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogLevel(undefined);
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should prefix messages with the tag', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('info');

    logInfo('store', 'hello');

    expect(log).toHaveBeenCalledWith('[store] hello');
  });

  it('should drop messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    logVerbose('store', 'hidden');
    logInfo('store', 'hidden');
    logWarn('store', 'shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[store] shown');
  });

  it('should send errors to stderr and nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('error');
    logError('linker', 'failed', 42);

    setLogLevel('silent');
    logError('linker', 'hidden');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('[linker] failed', 42);
  });

  it('should fall back to STASHLINK_LOG_LEVEL', () => {
    vi.stubEnv('STASHLINK_LOG_LEVEL', 'error');

    expect(getLogLevel()).toBe('error');
  });

  it('should ignore object prototype names as levels', () => {
    vi.stubEnv('STASHLINK_LOG_LEVEL', 'toString');

    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
    expect(getLogLevel()).toBe('info');
  });
});

describe('error helpers', () => {
  it('should wrap raw fs errors with the operation and path', async () => {
    const raw = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });

    const result = withFsContext('read', '/x/y', () => Promise.reject(raw));

    await expect(result).rejects.toBeInstanceOf(FsOperationError);
    await expect(result).rejects.toThrow('failed to read /x/y: ENOENT: no such file');
  });

  it('should pass store errors through unchanged', async () => {
    const notFound = new NotFoundError('abc');

    await expect(withFsContext('read', '/x', () => Promise.reject(notFound))).rejects.toBe(notFound);
  });

  it('should read errno codes', () => {
    expect(errnoCode(Object.assign(new Error('x'), { code: 'EEXIST' }))).toBe('EEXIST');
    expect(errnoCode(new Error('x'))).toBeUndefined();
    expect(errnoCode('EEXIST')).toBeUndefined();
  });

  it('should match categories', () => {
    const err = new NotFoundError('abc');

    expect(err.message).toBe('package not found in store: abc');
    expect(isStashlinkError(err)).toBe(true);
    expect(isStashlinkError(err, 'not_found')).toBe(true);
    expect(isStashlinkError(err, 'io')).toBe(false);
    expect(isStashlinkError(new Error('plain'))).toBe(false);
  });
});
