/**
 * @stashlink/core - content-addressed package store and import linker
 *
 * Core concepts:
 * - Same files + same manifest → same hash, stored once, read-only
 * - A project's imports directory is grafted into a runtime through its own
 *   module-search extension point, and the graft is recorded in the project
 */

export { PackageStore } from './store.js';

export type {
  StoredPackage,
  PutResult,
  PackageStoreOptions,
  TargetLanguage,
  EnvironmentDescriptor,
  GraftResult,
  UngraftResult,
  PackageLink,
} from './types.js';
export { TARGET_LANGUAGES } from './types.js';

export {
  computeContentHash,
  normalizeHash,
  parseHash,
  isValidHash,
  toIntegrity,
  getShard,
  sortPaths,
  assertSafeRelativePath,
  MANIFEST_SENTINEL,
  INTEGRITY_PREFIX,
} from './hash.js';

export {
  buildPackagePath,
  isDirectory,
  removeDir,
  FILES_DIRNAME,
  MANIFEST_FILENAME,
  HASH_ALGORITHM_DIRNAME,
} from './storeLayout.js';

export { freezeTree, thawTree, supportsPosixPermissions } from './permissions.js';

export { probePythonEnvironment, findVenvSitePackages, findSystemSitePackages } from './environment.js';
export type { ProbeOptions, InterpreterQuery } from './environment.js';

export {
  graft,
  ungraft,
  readGraftRecord,
  installRegisterScript,
  removeRegisterScript,
  trackingFilePath,
  registerScriptPath,
  PTH_FILENAME,
} from './linker.js';

export { ImportsDirectory, normalizePythonName, NAMESPACE } from './importsDir.js';

export { loadConfig, ConfigError, STASHLINK_DIRNAME } from './config.js';
export type { StashlinkConfig } from './config.js';

export { setLogLevel, getLogLevel, isLogLevel, logVerbose, logInfo, logWarn, logError, LOG_LEVELS } from './logger.js';
export type { LogLevel } from './logger.js';

export {
  StashlinkError,
  NotFoundError,
  EnvironmentDiscoveryError,
  FsOperationError,
  InvalidInputError,
  IntegrityError,
  isStashlinkError,
} from './errors.js';
export type { StashlinkErrorCode, DiscoveryFailureReason, FsOperation } from './errors.js';
