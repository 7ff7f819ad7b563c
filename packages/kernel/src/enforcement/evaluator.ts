/**
 * DDM Status Kernel — Enforcement Evaluator
 *
 * Pure, deterministic evaluation of the installed OS version against the
 * latest enforcement entry in the install log.
 *
 * Evaluation policy:
 * - No enforcement entry (or a malformed one) → up to date, no deadline.
 * - Installed version ≥ required version → up to date.
 * - Otherwise → update required, with the calendar days left until the
 *   deadline (negative once it has passed).
 *
 * The result depends only on the three parameters. Calling evaluate twice
 * with the same inputs yields structurally identical output.
 */

import { calendarDaysBetween } from '../time/local-date-time.js';
import type { LocalDateTime } from '../time/local-date-time.js';
import { compareVersionParts, parseVersion } from '../version/compare.js';
import { parseLatestEnforcement } from './parser.js';
import type { EnforcementStatus } from '../types/enforcement.js';

/** The status reported when the log carries no usable enforcement entry. */
export const NO_ENFORCEMENT: EnforcementStatus = {
  isUpToDate: true,
  daysRemaining: null,
  record: null,
};

/**
 * Evaluate enforcement status.
 *
 * @param installedVersion - Installed OS version; a placeholder such as `–`
 *   compares as an all-zero version
 * @param logText - Full install log text
 * @param now - Current wall-clock reading, in the same frame as log deadlines
 */
export function evaluate(
  installedVersion: string,
  logText: string,
  now: LocalDateTime,
): EnforcementStatus {
  const record = parseLatestEnforcement(logText);
  if (record === null) {
    return NO_ENFORCEMENT;
  }

  return {
    isUpToDate: compareVersionParts(parseVersion(installedVersion), record.requiredVersionParts) >= 0,
    daysRemaining: calendarDaysBetween(now, record.deadline),
    record,
  };
}
