/**
 * DDM Status Runtime Host — Status Collector
 *
 * One refresh: probe the system, evaluate against the local wall clock,
 * build the snapshot and record it in the status history.
 */

import { fromDate, StatusSnapshotBuilder } from '@ddm-status/kernel';
import type { StatusHash, StatusSnapshot } from '@ddm-status/kernel';
import type { Logger } from 'pino';
import type { SystemProbe } from './probe.js';
import type { StatusHistorySink } from './logging/status-history.js';

export interface StatusCollectorOptions {
  readonly probe: SystemProbe;
  readonly logger: Logger;
  /** When absent, snapshots are not recorded. */
  readonly history?: StatusHistorySink | undefined;
  /** Injectable clock for deterministic tests. */
  readonly clock?: (() => Date) | undefined;
}

export class StatusCollector {
  private readonly builder = new StatusSnapshotBuilder();
  private readonly clock: () => Date;

  constructor(private readonly options: StatusCollectorOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async collect(): Promise<StatusSnapshot> {
    const readings = await this.options.probe.read();
    const at = this.clock();

    const snapshot = this.builder.build(
      { ...readings, now: fromDate(at) },
      () => at.toISOString(),
    );

    const { enforcement } = snapshot;
    this.options.logger.info(
      {
        installedVersion: snapshot.installedVersion,
        requiredVersion: enforcement.record?.requiredVersion ?? null,
        isUpToDate: enforcement.isUpToDate,
        daysRemaining: enforcement.daysRemaining,
      },
      'status collected',
    );

    this.record(snapshot);
    return snapshot;
  }

  private record(snapshot: StatusSnapshot): void {
    const { history, logger } = this.options;
    if (history === undefined) return;
    try {
      history.append(snapshot);
    } catch (err: unknown) {
      // History is best-effort; the snapshot is returned regardless.
      logger.warn({ err }, 'status history append failed');
    }
  }

  /** Content hash of a snapshot, for change detection across refreshes. */
  hash(snapshot: StatusSnapshot): StatusHash {
    return this.builder.hash(snapshot);
  }
}
