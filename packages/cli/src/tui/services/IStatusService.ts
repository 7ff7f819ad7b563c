/**
 * IStatusService — the single boundary between the CLI surfaces and the host.
 *
 * Commands, output renderers and dashboard components get everything they
 * display through this interface. They may use kernel types, but never
 * construct collectors, loggers or state I/O from @ddm-status/runtime-host
 * themselves.
 */

import type { StatusSnapshot } from '@ddm-status/kernel'

export interface HistoryEntry {
  timestamp: string
  installedVersion: string
  requiredVersion: string | null
  isUpToDate: boolean
  daysRemaining: number | null
  diskOk: boolean
  uptimeOk: boolean
}

export interface StatusUpdateEvent {
  snapshot: StatusSnapshot
  changed: boolean
}

export interface IStatusService {
  /** Refresh cadence for watch mode and the dashboard. */
  readonly refreshIntervalMs: number

  /** Latest snapshot; collects one if none has been taken yet. */
  getStatus(): Promise<StatusSnapshot>

  /** Collect a new snapshot now. */
  refresh(): Promise<StatusSnapshot>

  /** Most recent history entries, oldest first. */
  getHistory(limit: number): Promise<HistoryEntry[]>

  /**
   * Refresh immediately and then on the interval, reporting each result.
   * Returns the function that stops watching.
   */
  watch(onUpdate: (event: StatusUpdateEvent) => void, onError: (err: unknown) => void): () => void
}
