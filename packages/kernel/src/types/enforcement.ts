/**
 * DDM Status Kernel — Enforcement Types
 *
 * An enforcement record is what a declarative-management update command
 * leaves in the install log: a deadline and the OS version that must be
 * installed by then. Both fields come from the same log line, so a record
 * either carries both or does not exist at all.
 */

import type { LocalDateTime } from '../time/local-date-time.js';

// ---------------------------------------------------------------------------
// Enforcement Record
// ---------------------------------------------------------------------------

export interface EnforcementRecord {
  /** Wall-clock deadline, parsed without a timezone. */
  readonly deadline: LocalDateTime;
  /** Required version exactly as it appeared in the log line (for display). */
  readonly requiredVersion: string;
  /** Numeric segments of requiredVersion. */
  readonly requiredVersionParts: ReadonlyArray<number>;
}

// ---------------------------------------------------------------------------
// Enforcement Status
// ---------------------------------------------------------------------------

/**
 * The evaluator's output. Derived on every refresh, never stored.
 *
 * When no enforcement record exists the status is the optimistic default:
 * up to date, no days remaining, no record.
 */
export interface EnforcementStatus {
  readonly isUpToDate: boolean;
  /**
   * Calendar days from now to the deadline. Negative once the deadline
   * date has passed. Null when there is no enforcement record.
   */
  readonly daysRemaining: number | null;
  /** Pass-through of the record the status was derived from. */
  readonly record: EnforcementRecord | null;
}
