/**
 * DDM Status Runtime Host — Preference Loading
 *
 * Preferences come from one of two JSON files:
 *
 *   1. The managed file, deployed by device management. If it exists it is
 *      the only file consulted, even when it cannot be parsed.
 *   2. The local file, for machines without a managed profile.
 *
 * Keys keep the names administrators already deploy:
 *
 *   MinimumDiskFreePercentage     integer, default 10
 *   DaysOfExcessiveUptimeWarning  integer, default 7 (0 disables)
 *   SupportTeamName               string,  default "IT Support"
 *   SupportTeamPhone              string,  default ""
 *   SupportTeamEmail              string,  default ""
 *   SupportTeamWebsite            string,  default ""
 *
 * Each key is validated on its own: a missing or mistyped value falls back
 * to its default without discarding the rest of the file.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from 'pino';
import { DEFAULT_PREFERENCES } from '@ddm-status/kernel';
import type { Preferences } from '@ddm-status/kernel';
import { isNodeError } from './files.js';

const D = DEFAULT_PREFERENCES;

export const PreferencesFileSchema = z.object({
  MinimumDiskFreePercentage: z.number().int().catch(D.minimumDiskFreePercentage),
  DaysOfExcessiveUptimeWarning: z.number().int().nonnegative().catch(D.daysOfExcessiveUptimeWarning),
  SupportTeamName: z.string().catch(D.supportTeamName),
  SupportTeamPhone: z.string().catch(D.supportTeamPhone),
  SupportTeamEmail: z.string().catch(D.supportTeamEmail),
  SupportTeamWebsite: z.string().catch(D.supportTeamWebsite),
});

export type PreferencesFile = z.infer<typeof PreferencesFileSchema>;

export interface PreferenceLocations {
  readonly managedPath: string;
  readonly localPath: string;
}

export type PreferenceSource = 'managed' | 'local' | 'defaults';

export interface LoadedPreferences {
  readonly preferences: Preferences;
  readonly source: PreferenceSource;
  /** File the preferences were read from; null for defaults. */
  readonly path: string | null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function loadPreferences(
  locations: PreferenceLocations,
  logger: Logger,
): Promise<LoadedPreferences> {
  const managed = await readIfPresent(locations.managedPath, logger);
  if (managed !== null) {
    return {
      preferences: parsePreferences(managed, locations.managedPath, logger),
      source: 'managed',
      path: locations.managedPath,
    };
  }

  const local = await readIfPresent(locations.localPath, logger);
  if (local !== null) {
    return {
      preferences: parsePreferences(local, locations.localPath, logger),
      source: 'local',
      path: locations.localPath,
    };
  }

  return { preferences: DEFAULT_PREFERENCES, source: 'defaults', path: null };
}

/**
 * Parse preference file text. Unparsable JSON or a non-object document
 * yields the defaults.
 */
export function parsePreferences(text: string, path: string, logger: Logger): Preferences {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err: unknown) {
    logger.warn({ path, err }, 'preference file is not valid JSON; using defaults');
    return DEFAULT_PREFERENCES;
  }

  const parsed = PreferencesFileSchema.safeParse(document);
  if (!parsed.success) {
    logger.warn({ path }, 'preference file is not a JSON object; using defaults');
    return DEFAULT_PREFERENCES;
  }

  const file = parsed.data;
  return {
    minimumDiskFreePercentage: file.MinimumDiskFreePercentage,
    daysOfExcessiveUptimeWarning: file.DaysOfExcessiveUptimeWarning,
    supportTeamName: file.SupportTeamName,
    supportTeamPhone: file.SupportTeamPhone,
    supportTeamEmail: file.SupportTeamEmail,
    supportTeamWebsite: file.SupportTeamWebsite,
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * File text, or null when the file does not exist. A file that exists but
 * cannot be read is treated as present and empty, so it still shadows the
 * local file.
 *
 * @internal
 */
async function readIfPresent(path: string, logger: Logger): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    logger.warn({ path, err }, 'preference file unreadable');
    return '';
  }
}
