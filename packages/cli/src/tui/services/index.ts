import { loadHostConfig } from '@ddm-status/runtime-host'
import type { HostConfigOptions } from '@ddm-status/runtime-host'
import type { IStatusService } from './IStatusService.js'
import { LiveStatusService } from './LiveStatusService.js'
import { StaticStatusService } from './StaticStatusService.js'

export interface StatusServiceOptions extends HostConfigOptions {
  demo?: boolean | undefined
}

/**
 * createStatusService — the one place a surface obtains its IStatusService.
 *
 * `demo` selects the fixed sample data; otherwise the host configuration is
 * resolved (option → env var → default) and the live service reads the
 * machine. Throws if the configuration is invalid.
 */
export function createStatusService(opts: StatusServiceOptions = {}): IStatusService {
  if (opts.demo === true) return new StaticStatusService()
  return new LiveStatusService(loadHostConfig(opts))
}

export type { IStatusService, HistoryEntry, StatusUpdateEvent } from './IStatusService.js'
