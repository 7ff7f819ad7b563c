/**
 * DDM Status Kernel — System Health Assessment
 *
 * Turns raw disk and uptime samples into pass/fail health entries using the
 * thresholds from Preferences. Pure arithmetic; sampling lives in the
 * runtime host.
 */

const BYTES_PER_GB = 1_000_000_000;
const SECONDS_PER_DAY = 86_400;

// ---------------------------------------------------------------------------
// Disk
// ---------------------------------------------------------------------------

export interface DiskSample {
  readonly availableBytes: number;
  readonly totalBytes: number;
}

export interface DiskHealth {
  /** Decimal gigabytes available (1 GB = 10^9 bytes). */
  readonly freeGB: number;
  /** 0-100. Zero when the total is unknown. */
  readonly freePercent: number;
  readonly ok: boolean;
}

export function assessDisk(sample: DiskSample, minimumFreePercent: number): DiskHealth {
  const freePercent = sample.totalBytes > 0
    ? (sample.availableBytes / sample.totalBytes) * 100
    : 0;
  return {
    freeGB: sample.availableBytes / BYTES_PER_GB,
    freePercent,
    ok: freePercent >= minimumFreePercent,
  };
}

// ---------------------------------------------------------------------------
// Uptime
// ---------------------------------------------------------------------------

export interface UptimeHealth {
  /** Whole days since the last boot. */
  readonly daysSinceReboot: number;
  readonly ok: boolean;
}

/**
 * @param uptimeSeconds - Seconds since boot
 * @param excessiveUptimeDays - Warning threshold; 0 disables the check
 */
export function assessUptime(uptimeSeconds: number, excessiveUptimeDays: number): UptimeHealth {
  const daysSinceReboot = Math.max(0, Math.floor(uptimeSeconds / SECONDS_PER_DAY));
  return {
    daysSinceReboot,
    ok: excessiveUptimeDays === 0 || daysSinceReboot < excessiveUptimeDays,
  };
}
