/**
 * DDM Status Runtime Host — Home and Source Path Resolution
 *
 * Every location the host reads from or writes to is resolved with the same
 * precedence chain:
 *
 *   1. Explicit option (e.g. from a CLI flag)
 *   2. Environment variable
 *   3. Built-in default
 *
 * The status home holds the host's own state:
 *
 *   <DDM_STATUS_HOME>/
 *     logs/
 *       status.jsonl
 *
 * The source paths point at the system files the collectors read. Their
 * defaults are the macOS locations; overriding them lets the tool run
 * against fixtures or a mounted image.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

/** Preference domain; the preference files are `<domain>.json`. */
export const PREFERENCE_DOMAIN = 'ddm-status';

// ---------------------------------------------------------------------------
// Status home
// ---------------------------------------------------------------------------

export interface ResolveStatusHomeOptions {
  /** Explicit override — highest precedence. */
  readonly statusHome?: string | undefined;
}

/**
 * Resolve the status home directory.
 *
 * Precedence (highest to lowest):
 *   1. opts.statusHome
 *   2. DDM_STATUS_HOME env var
 *   3. Default: ~/.ddm-status
 *
 * Creates the resolved directory if it does not already exist.
 */
export function resolveStatusHome(opts?: ResolveStatusHomeOptions): string {
  const statusHome = pick(opts?.statusHome, 'DDM_STATUS_HOME') ?? join(homedir(), '.ddm-status');

  if (!existsSync(statusHome)) {
    mkdirSync(statusHome, { recursive: true });
  }
  return statusHome;
}

// ---------------------------------------------------------------------------
// Source paths
// ---------------------------------------------------------------------------

export interface SourcePaths {
  /** Install log carrying enforcement entries. */
  readonly installLog: string;
  /** Administrator-managed preferences; wins over the local file when present. */
  readonly managedPreferences: string;
  readonly localPreferences: string;
  /** Exists when an update payload has been downloaded and prepared. */
  readonly stagedUpdateMarker: string;
  /** Executable printing the installed OS version. */
  readonly swVersCommand: string;
  /** Volume whose free space is reported. */
  readonly diskVolume: string;
}

export type SourcePathOverrides = { readonly [K in keyof SourcePaths]?: string | undefined };

export const DEFAULT_SOURCE_PATHS: SourcePaths = {
  installLog: '/var/log/install.log',
  managedPreferences: `/Library/Managed Preferences/${PREFERENCE_DOMAIN}.json`,
  localPreferences: `/Library/Preferences/${PREFERENCE_DOMAIN}.json`,
  stagedUpdateMarker: '/System/Volumes/Update/Prepared',
  swVersCommand: '/usr/bin/sw_vers',
  diskVolume: '/',
};

const SOURCE_PATH_ENV: Readonly<Record<keyof SourcePaths, string>> = {
  installLog: 'DDM_STATUS_INSTALL_LOG',
  managedPreferences: 'DDM_STATUS_PREFS_MANAGED',
  localPreferences: 'DDM_STATUS_PREFS_LOCAL',
  stagedUpdateMarker: 'DDM_STATUS_STAGED_PATH',
  swVersCommand: 'DDM_STATUS_SW_VERS',
  diskVolume: 'DDM_STATUS_DISK_VOLUME',
};

/**
 * Resolve every source path through option → env var → default.
 */
export function resolveSourcePaths(overrides: SourcePathOverrides = {}): SourcePaths {
  return {
    installLog: resolveSourcePath('installLog', overrides),
    managedPreferences: resolveSourcePath('managedPreferences', overrides),
    localPreferences: resolveSourcePath('localPreferences', overrides),
    stagedUpdateMarker: resolveSourcePath('stagedUpdateMarker', overrides),
    swVersCommand: resolveSourcePath('swVersCommand', overrides),
    diskVolume: resolveSourcePath('diskVolume', overrides),
  };
}

function resolveSourcePath(key: keyof SourcePaths, overrides: SourcePathOverrides): string {
  return pick(overrides[key], SOURCE_PATH_ENV[key]) ?? DEFAULT_SOURCE_PATHS[key];
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * First non-empty value of an explicit option and an environment variable.
 *
 * @internal
 */
export function pick(explicit: string | undefined, envVar: string): string | undefined {
  if (typeof explicit === 'string' && explicit !== '') return explicit;
  const fromEnv = process.env[envVar];
  if (typeof fromEnv === 'string' && fromEnv !== '') return fromEnv;
  return undefined;
}
