/**
 * DDM Status Kernel — Status Snapshot Types
 *
 * A StatusSnapshot is everything a display surface needs after one refresh.
 * It is built in one step from a full set of inputs and is never patched:
 * each refresh produces a new snapshot that replaces the previous one.
 */

import type { LocalDateTime } from '../time/local-date-time.js';
import type { EnforcementStatus } from './enforcement.js';
import type { Preferences } from './preferences.js';
import type { DiskHealth, DiskSample, UptimeHealth } from '../health/assess.js';
import type { StatusBadge } from '../status/urgency.js';
import type { SupportAction } from '../status/support.js';

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/**
 * Raw readings gathered by the runtime host for one refresh.
 */
export interface StatusInputs {
  /** Installed OS version, or a placeholder when it could not be read. */
  readonly installedVersion: string;
  /** Install log text; empty when the log could not be read. */
  readonly logText: string;
  readonly now: LocalDateTime;
  readonly disk: DiskSample;
  readonly uptimeSeconds: number;
  /** True when an update payload is downloaded and ready to install. */
  readonly updateStaged: boolean;
  readonly preferences: Preferences;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface StatusSnapshot {
  readonly installedVersion: string;
  readonly enforcement: EnforcementStatus;
  readonly badge: StatusBadge;
  readonly disk: DiskHealth;
  readonly uptime: UptimeHealth;
  readonly updateStaged: boolean;
  readonly preferences: Preferences;
  readonly supportActions: ReadonlyArray<SupportAction>;
  /** ISO 8601 instant the snapshot was built. Excluded from the hash. */
  readonly collectedAt: string;
}

/**
 * SHA-256 hex digest of a snapshot's content (collectedAt excluded).
 *
 * Branded so that arbitrary strings cannot be passed where a snapshot hash
 * is expected. Only StatusSnapshotBuilder.hash() produces one.
 */
export type StatusHash = string & { readonly __brand: 'StatusHash' };
