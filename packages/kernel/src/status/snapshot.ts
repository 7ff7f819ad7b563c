/**
 * DDM Status Kernel — Status Snapshot Builder
 *
 * Combines one refresh worth of raw readings into an immutable
 * StatusSnapshot, and hashes snapshots so callers can tell whether anything
 * the user would see has changed between two refreshes.
 *
 * build() is pure apart from the injectable clock used for collectedAt.
 * hash() is a pure deterministic function: SHA-256 over canonical JSON.
 */

import { createHash } from 'node:crypto';
import { evaluate } from '../enforcement/evaluator.js';
import { assessDisk, assessUptime } from '../health/assess.js';
import { statusBadge } from './urgency.js';
import { supportActions } from './support.js';
import type { StatusHash, StatusInputs, StatusSnapshot } from '../types/snapshot.js';

// ---------------------------------------------------------------------------
// Internal: Canonical JSON for deterministic hashing
// ---------------------------------------------------------------------------

/**
 * JSON with object keys sorted at every level, so identical content always
 * serializes identically regardless of property insertion order.
 */
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  return 'null';
}

// ---------------------------------------------------------------------------
// StatusSnapshotBuilder
// ---------------------------------------------------------------------------

export class StatusSnapshotBuilder {
  /**
   * Build a snapshot from raw readings.
   *
   * The enforcement status is evaluated against `inputs.now`; disk and
   * uptime are assessed against the thresholds in `inputs.preferences`.
   * collectedAt comes from clockFn, injectable for deterministic tests.
   */
  build(
    inputs: StatusInputs,
    clockFn: () => string = () => new Date().toISOString(),
  ): StatusSnapshot {
    const { preferences } = inputs;
    const enforcement = evaluate(inputs.installedVersion, inputs.logText, inputs.now);

    return {
      installedVersion: inputs.installedVersion,
      enforcement,
      badge: statusBadge(enforcement),
      disk: assessDisk(inputs.disk, preferences.minimumDiskFreePercentage),
      uptime: assessUptime(inputs.uptimeSeconds, preferences.daysOfExcessiveUptimeWarning),
      updateStaged: inputs.updateStaged,
      preferences,
      supportActions: supportActions(preferences),
      collectedAt: clockFn(),
    };
  }

  /**
   * SHA-256 over the canonical JSON of the snapshot without collectedAt.
   * Two refreshes that would display the same thing hash identically.
   */
  hash(snapshot: StatusSnapshot): StatusHash {
    const { collectedAt: _collectedAt, ...content } = snapshot;
    const hex = createHash('sha256').update(canonicalize(content)).digest('hex');
    // The only place a StatusHash is minted.
    return hex as StatusHash;
  }
}
