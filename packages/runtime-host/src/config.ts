/**
 * DDM Status Runtime Host — Host Configuration
 *
 * Everything the host needs to run one collection or a refresh loop,
 * resolved once at start-up through the option → env var → default chain
 * (see home.ts).
 */

import { z } from 'zod';
import { pick, resolveSourcePaths, resolveStatusHome } from './home.js';
import type { SourcePathOverrides, SourcePaths } from './home.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** One hour, the cadence of the status bar refresh. */
export const DEFAULT_REFRESH_MINUTES = 60;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface HostConfig {
  readonly statusHome: string;
  readonly sources: SourcePaths;
  readonly refreshIntervalMs: number;
  readonly logLevel: LogLevel;
  /** Upper bound on the OS version query. */
  readonly execTimeoutMs: number;
}

export interface HostConfigOptions {
  readonly statusHome?: string | undefined;
  readonly sources?: SourcePathOverrides | undefined;
  readonly refreshMinutes?: string | undefined;
  readonly logLevel?: string | undefined;
}

const RefreshMinutesSchema = z.coerce.number().positive().max(24 * 60);
const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Resolve the host configuration.
 *
 * @throws {Error} If the refresh interval or log level is set to an invalid
 *   value. A typo in an explicit setting is reported rather than silently
 *   replaced by the default.
 */
export function loadHostConfig(opts: HostConfigOptions = {}): HostConfig {
  const refreshRaw = pick(opts.refreshMinutes, 'DDM_STATUS_REFRESH_MINUTES');
  const levelRaw = pick(opts.logLevel, 'DDM_STATUS_LOG_LEVEL');

  let refreshMinutes = DEFAULT_REFRESH_MINUTES;
  if (refreshRaw !== undefined) {
    const parsed = RefreshMinutesSchema.safeParse(refreshRaw);
    if (!parsed.success) {
      throw new Error(
        `Invalid refresh interval '${refreshRaw}': expected minutes between 0 and 1440.`,
      );
    }
    refreshMinutes = parsed.data;
  }

  let logLevel = DEFAULT_LOG_LEVEL;
  if (levelRaw !== undefined) {
    const parsed = LogLevelSchema.safeParse(levelRaw);
    if (!parsed.success) {
      throw new Error(`Invalid log level '${levelRaw}': expected one of ${LOG_LEVELS.join(', ')}.`);
    }
    logLevel = parsed.data;
  }

  return {
    statusHome: resolveStatusHome({ statusHome: opts.statusHome }),
    sources: resolveSourcePaths(opts.sources),
    refreshIntervalMs: Math.round(refreshMinutes * 60_000),
    logLevel,
    execTimeoutMs: 5_000,
  };
}
