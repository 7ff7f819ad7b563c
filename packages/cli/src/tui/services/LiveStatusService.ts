import type { StatusSnapshot } from '@ddm-status/kernel'
import {
  FileStateIO,
  NodeSystemProbe,
  StatusCollector,
  StatusHistorySink,
  StatusMonitor,
  STATUS_LOG,
  createLogger,
  latestEvents,
  readStatusHistory,
} from '@ddm-status/runtime-host'
import type { HostConfig, Logger, StateIO, SystemProbe } from '@ddm-status/runtime-host'
import type { HistoryEntry, IStatusService, StatusUpdateEvent } from './IStatusService.js'

export interface LiveStatusServiceDeps {
  /** Defaults to the real system probe for `config`. */
  probe?: SystemProbe
  /** Defaults to a FileStateIO under the status home. */
  stateIO?: StateIO
  /** Defaults to a stderr logger at the configured level. */
  logger?: Logger
}

/**
 * LiveStatusService — reads the real machine through the runtime host.
 *
 * Wires probe → collector → monitor once per process; every surface then
 * shares the same monitor, so the dashboard's `r` and its auto-refresh never
 * run two collections at once.
 */
export class LiveStatusService implements IStatusService {
  readonly refreshIntervalMs: number
  private readonly stateIO: StateIO
  private readonly monitor: StatusMonitor

  constructor(config: HostConfig, deps: LiveStatusServiceDeps = {}) {
    const logger = deps.logger ?? createLogger(config.logLevel)
    this.refreshIntervalMs = config.refreshIntervalMs
    this.stateIO = deps.stateIO ?? new FileStateIO(config.statusHome)

    const collector = new StatusCollector({
      probe: deps.probe ?? new NodeSystemProbe(config, logger),
      logger,
      history: new StatusHistorySink(this.stateIO),
    })
    this.monitor = new StatusMonitor({ collector, intervalMs: config.refreshIntervalMs, logger })
  }

  async getStatus(): Promise<StatusSnapshot> {
    return this.monitor.snapshot ?? this.monitor.refresh()
  }

  async refresh(): Promise<StatusSnapshot> {
    return this.monitor.refresh()
  }

  async getHistory(limit: number): Promise<HistoryEntry[]> {
    const history = readStatusHistory(this.stateIO.readLogRaw(STATUS_LOG))
    return latestEvents(history, limit).map((e) => ({
      timestamp: e.timestamp,
      installedVersion: e.installed_version,
      requiredVersion: e.required_version,
      isUpToDate: e.is_up_to_date,
      daysRemaining: e.days_remaining,
      diskOk: e.disk_ok,
      uptimeOk: e.uptime_ok,
    }))
  }

  watch(onUpdate: (event: StatusUpdateEvent) => void, onError: (err: unknown) => void): () => void {
    const offUpdate = this.monitor.onUpdate(onUpdate)
    const offError = this.monitor.onError(onError)
    this.monitor.start()
    return () => {
      this.monitor.stop()
      offUpdate()
      offError()
    }
  }
}
