/**
 * DDM Status Runtime Host — Status Monitor
 *
 * Keeps a current snapshot fresh: one refresh on start, then one per
 * interval until stopped. A refresh requested while another is running
 * joins it instead of starting a second collection.
 *
 * Listeners are told about every completed refresh, with `changed` set
 * when the content hash differs from the previous snapshot's.
 */

import type { StatusHash, StatusSnapshot } from '@ddm-status/kernel';
import type { Logger } from 'pino';
import type { StatusCollector } from './collector.js';

export interface StatusUpdate {
  readonly snapshot: StatusSnapshot;
  /** False when the snapshot shows the same thing as the previous one. */
  readonly changed: boolean;
}

export type StatusListener = (update: StatusUpdate) => void;
export type StatusErrorListener = (err: unknown) => void;

export interface StatusMonitorOptions {
  readonly collector: StatusCollector;
  readonly intervalMs: number;
  readonly logger: Logger;
}

export class StatusMonitor {
  private current: StatusSnapshot | null = null;
  private currentHash: StatusHash | null = null;
  private inFlight: Promise<StatusSnapshot> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly listeners = new Set<StatusListener>();
  private readonly errorListeners = new Set<StatusErrorListener>();

  constructor(private readonly options: StatusMonitorOptions) {}

  /** Latest snapshot, or null before the first refresh completes. */
  get snapshot(): StatusSnapshot | null {
    return this.current;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start refreshing. Calling start on a running monitor does nothing. */
  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => { this.refreshInBackground(); }, this.options.intervalMs);
    this.refreshInBackground();
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Collect now. Concurrent callers share one collection.
   *
   * @throws Whatever the collector throws; the current snapshot is kept.
   */
  refresh(): Promise<StatusSnapshot> {
    if (this.inFlight !== null) return this.inFlight;

    const run = this.options.collector.collect().then((snapshot) => {
      this.publish(snapshot);
      return snapshot;
    });
    this.inFlight = run.finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Subscribe to completed refreshes. Returns the unsubscribe function. */
  onUpdate(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  /** Subscribe to failed background refreshes. Returns the unsubscribe function. */
  onError(listener: StatusErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => { this.errorListeners.delete(listener); };
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private publish(snapshot: StatusSnapshot): void {
    const hash = this.options.collector.hash(snapshot);
    const changed = hash !== this.currentHash;
    this.current = snapshot;
    this.currentHash = hash;
    for (const listener of this.listeners) {
      listener({ snapshot, changed });
    }
  }

  private refreshInBackground(): void {
    this.refresh().catch((err: unknown) => {
      this.options.logger.error({ err }, 'status refresh failed');
      for (const listener of this.errorListeners) {
        listener(err);
      }
    });
  }
}
