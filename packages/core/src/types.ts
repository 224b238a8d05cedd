/**
 * Shared type definitions
 */

/**
 * A package committed to the store
 */
export interface StoredPackage {
  /** Full sha256 hex digest */
  hash: string;
  /** Package directory (<root>/sha256/<shard>/<hash>) */
  path: string;
  /** Root of the stored file tree */
  filesDir: string;
  /** Path of the stored manifest blob */
  manifestPath: string;
}

/**
 * Outcome of `PackageStore.commit`
 */
export interface PutResult {
  hash: string;
  /** False when the package was already in the store */
  created: boolean;
}

/**
 * PackageStore configuration
 */
export interface PackageStoreOptions {
  /** Store root directory, defaults to the configured store root */
  root?: string;
  /** Platform used to decide whether permission bits apply, defaults to process.platform */
  platform?: NodeJS.Platform;
}

/** Languages the imports directory can hold packages for */
export type TargetLanguage = 'python' | 'javascript';

export const TARGET_LANGUAGES: readonly TargetLanguage[] = ['python', 'javascript'];

/**
 * Where a runtime's package directory was found.
 * Produced once by a probe; the linker never looks at process state itself.
 */
export interface EnvironmentDescriptor {
  language: 'python';
  /** How the environment was located */
  source: 'virtualenv' | 'system';
  /** Virtualenv root, or the interpreter that was queried */
  root: string;
  /** Directory the runtime reads path-configuration files from */
  packageDir: string;
}

/**
 * Result of a graft
 */
export interface GraftResult {
  /** Path-configuration file written into the environment */
  configFile: string;
  /** Tracking record written into the project */
  trackingFile: string;
  /** Absolute imports directory the config file names */
  importsDir: string;
}

export interface UngraftResult {
  /** Path-configuration file this call deleted, or null if there was none to delete */
  removed: string | null;
}

/**
 * A symlink in the imports directory
 */
export interface PackageLink {
  language: TargetLanguage;
  /** Name as it appears in the namespace (normalized for python) */
  name: string;
  linkPath: string;
  target: string;
}
