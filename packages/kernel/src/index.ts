/**
 * @ddm-status/kernel
 *
 * Enforcement evaluator, version comparison, health assessment and status
 * snapshot construction.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for deterministic hashing (pure computation, not I/O).
 *
 * Reading the install log, querying the OS version and sampling the disk
 * live in @ddm-status/runtime-host.
 */

// Types
export type { EnforcementRecord, EnforcementStatus } from './types/enforcement.js';
export type { Preferences } from './types/preferences.js';
export { DEFAULT_PREFERENCES } from './types/preferences.js';
export type { StatusInputs, StatusSnapshot, StatusHash } from './types/snapshot.js';

// Wall-clock time
export type { LocalDateTime } from './time/local-date-time.js';
export {
  parseLocalDateTime,
  isValidLocalDateTime,
  formatLocalDateTime,
  fromDate,
  toDate,
  calendarDaysBetween,
} from './time/local-date-time.js';

// Versions
export type { VersionOrdering } from './version/compare.js';
export { parseVersion, compareVersions, compareVersionParts } from './version/compare.js';

// Enforcement
export {
  parseLatestEnforcement,
  parseEnforcementLine,
  ENFORCEMENT_LINE_MARKER,
} from './enforcement/parser.js';
export { evaluate, NO_ENFORCEMENT } from './enforcement/evaluator.js';

// Health
export type { DiskSample, DiskHealth, UptimeHealth } from './health/assess.js';
export { assessDisk, assessUptime } from './health/assess.js';

// Status presentation
export type { StatusBadge } from './status/urgency.js';
export { Urgency, urgencyFor, statusBadge, UP_TO_DATE_MARK, UNKNOWN_MARK } from './status/urgency.js';
export type { SupportAction, SupportActionKind } from './status/support.js';
export { supportActions, SOFTWARE_UPDATE_URL } from './status/support.js';
export { StatusSnapshotBuilder } from './status/snapshot.js';
