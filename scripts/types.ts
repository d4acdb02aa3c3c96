/**
 * Type definitions for the Dockerfile matrix updater
 */

/**
 * A major version directory
 */
export interface VersionRef {
  /** Path relative to the repository root (e.g., "8", "chakracore/10") */
  path: string;

  /** Directory holding the templates and config for this version (e.g., ".") */
  parentPath: string;

  /** Major version label (e.g., "10") */
  major: string;
}

/**
 * Dockerfile flavor; "default" is the version directory's own Dockerfile
 */
export type Variant = string;

/**
 * One concrete Dockerfile that may be regenerated
 */
export interface Target {
  version: VersionRef;
  variant: Variant;

  /** Template the Dockerfile is stamped from */
  template: string;

  /** Dockerfile written by the stamper */
  dockerfile: string;
}

/**
 * Exact-match filter; `all` selects every item
 */
export type Filter = { kind: 'all' } | { kind: 'subset'; items: ReadonlySet<string> };

/**
 * Trusted keys of one category, spliced in place of `"${<TYPE>_KEYS[@]}"`
 */
export interface KeyList {
  /** Category name (e.g., "node") */
  type: string;

  /** Key fingerprints in file order */
  keys: string[];
}

export type Keyring = KeyList[];

/**
 * Values stamped into a single Dockerfile
 */
export interface SubstitutionContext {
  /** Full runtime version (e.g., "10.12.0") */
  nodeVersion: string;

  /** Absent when neither fetched nor declared in the existing Dockerfile */
  yarnVersion?: string;

  /** Alpine base version, alpine variant only */
  alpineVersion?: string;

  keyring: Keyring;
}

/**
 * Read-only configuration shared by every task of a run
 */
export interface UpdateSettings {
  arch: string;

  /** Security update: reuse Yarn and Alpine versions from the existing Dockerfile */
  skip: boolean;

  /** Fetched once per run unless `skip` is set */
  yarnVersion?: string;
  alpineVersion?: string;

  keyring: Keyring;
}

export type TaskResult =
  | { target: Target; ok: true; nodeVersion: string }
  | { target: Target; ok: false; error: unknown };

export interface UpdateReport {
  /** Every discovered target, in manifest order */
  targets: Target[];

  /** One entry per stamped target */
  results: TaskResult[];

  /** Path of the written CI manifest */
  manifest: string;

  /** Build stages in the manifest */
  stages: number;
}
