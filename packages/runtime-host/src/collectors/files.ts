/**
 * DDM Status Runtime Host — File-Backed Readings
 *
 * Install log text, staged-update marker and root volume capacity.
 * Each reader degrades to its "no signal" value instead of throwing:
 *
 *   install log unreadable  → ''      (evaluates as up to date)
 *   marker check fails      → false
 *   statfs fails            → zero sample (reported as 0% free)
 */

import { access, readFile, statfs } from 'node:fs/promises';
import type { Logger } from 'pino';
import type { DiskSample } from '@ddm-status/kernel';

export const EMPTY_DISK_SAMPLE: DiskSample = { availableBytes: 0, totalBytes: 0 };

export async function readInstallLog(path: string, logger: Logger): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      logger.debug({ path }, 'install log not present');
    } else {
      logger.warn({ path, err }, 'install log unreadable');
    }
    return '';
  }
}

export async function isUpdateStaged(markerPath: string): Promise<boolean> {
  try {
    await access(markerPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Available bytes are those usable by an unprivileged process (f_bavail),
 * not the raw free count.
 */
export async function sampleDisk(volume: string, logger: Logger): Promise<DiskSample> {
  try {
    const stats = await statfs(volume);
    return {
      availableBytes: stats.bavail * stats.bsize,
      totalBytes: stats.blocks * stats.bsize,
    };
  } catch (err: unknown) {
    logger.warn({ volume, err }, 'disk capacity unavailable');
    return EMPTY_DISK_SAMPLE;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    err.code === code
  );
}
