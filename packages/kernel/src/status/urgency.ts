/**
 * DDM Status Kernel — Urgency and Status Badge
 *
 * The badge is the compact indicator shown in a status bar: a check mark
 * when up to date, otherwise the number of days left before the update is
 * enforced, coloured by urgency.
 */

import type { EnforcementStatus } from '../types/enforcement.js';

/**
 * Urgency buckets, most to least pressing.
 *
 * Ok is only used for the badge of an up-to-date system; urgencyFor never
 * returns it.
 */
export enum Urgency {
  /** One day or less left (or past the deadline). */
  Critical = 'critical',
  /** Two or three days left. */
  High = 'high',
  /** Four to seven days left. */
  Elevated = 'elevated',
  /** More than a week left. */
  Notice = 'notice',
  /** Days remaining unknown. */
  Unknown = 'unknown',
  Ok = 'ok',
}

export function urgencyFor(daysRemaining: number | null): Urgency {
  if (daysRemaining === null) return Urgency.Unknown;
  if (daysRemaining <= 1) return Urgency.Critical;
  if (daysRemaining <= 3) return Urgency.High;
  if (daysRemaining <= 7) return Urgency.Elevated;
  return Urgency.Notice;
}

export interface StatusBadge {
  readonly text: string;
  readonly urgency: Urgency;
}

export const UP_TO_DATE_MARK = '✓';
export const UNKNOWN_MARK = '–';

export function statusBadge(status: EnforcementStatus): StatusBadge {
  if (status.isUpToDate) {
    return { text: UP_TO_DATE_MARK, urgency: Urgency.Ok };
  }
  if (status.daysRemaining !== null) {
    return { text: String(status.daysRemaining), urgency: urgencyFor(status.daysRemaining) };
  }
  return { text: UNKNOWN_MARK, urgency: Urgency.Unknown };
}
