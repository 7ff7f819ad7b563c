/**
 * DDM Status Kernel — Preferences
 *
 * Administrator-configurable thresholds and support contact details.
 * Loading and validating the preference files is a runtime-host concern;
 * the kernel only defines the shape and the defaults.
 */

export interface Preferences {
  /** Free-space percentage below which disk space is flagged. */
  readonly minimumDiskFreePercentage: number;
  /** Days since reboot at which uptime is flagged. 0 disables the check. */
  readonly daysOfExcessiveUptimeWarning: number;
  readonly supportTeamName: string;
  readonly supportTeamPhone: string;
  readonly supportTeamEmail: string;
  readonly supportTeamWebsite: string;
}

export const DEFAULT_PREFERENCES: Preferences = {
  minimumDiskFreePercentage: 10,
  daysOfExcessiveUptimeWarning: 7,
  supportTeamName: 'IT Support',
  supportTeamPhone: '',
  supportTeamEmail: '',
  supportTeamWebsite: '',
} as const;
