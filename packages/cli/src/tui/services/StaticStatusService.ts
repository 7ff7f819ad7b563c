import { StatusSnapshotBuilder } from '@ddm-status/kernel'
import type { StatusInputs, StatusSnapshot } from '@ddm-status/kernel'
import type { HistoryEntry, IStatusService, StatusUpdateEvent } from './IStatusService.js'

/**
 * Demo machine: 26.2 installed, 26.3 enforced three days out, update
 * downloaded, nine days since the last reboot.
 */
export const DEMO_INPUTS: StatusInputs = {
  installedVersion: '26.2',
  logText: [
    '2026-03-02 08:14:03+01 demo-mac softwareupdated[412]: EnforcedInstallDate:2026-03-09T18:00:00|VersionString:26.2.1|',
    '2026-03-06 08:14:07+01 demo-mac softwareupdated[412]: EnforcedInstallDate:2026-03-13T12:00:00|VersionString:26.3|',
    '',
  ].join('\n'),
  now: { year: 2026, month: 3, day: 10, hour: 9, minute: 0, second: 0 },
  disk: { availableBytes: 120_000_000_000, totalBytes: 500_000_000_000 },
  uptimeSeconds: 9 * 86_400 + 3_600,
  updateStaged: true,
  preferences: {
    minimumDiskFreePercentage: 10,
    daysOfExcessiveUptimeWarning: 7,
    supportTeamName: 'Service Desk',
    supportTeamPhone: '+1 555 0100',
    supportTeamEmail: 'servicedesk@example.com',
    supportTeamWebsite: 'https://help.example.com',
  },
}

export const DEMO_COLLECTED_AT = '2026-03-10T08:00:00.000Z'

const DEMO_HISTORY: HistoryEntry[] = [
  { timestamp: '2026-03-08T08:00:00.000Z', installedVersion: '26.2', requiredVersion: '26.2.1', isUpToDate: false, daysRemaining: 1,    diskOk: true, uptimeOk: true },
  { timestamp: '2026-03-09T08:00:00.000Z', installedVersion: '26.2', requiredVersion: '26.2.1', isUpToDate: false, daysRemaining: 0,    diskOk: true, uptimeOk: false },
  { timestamp: '2026-03-10T08:00:00.000Z', installedVersion: '26.2', requiredVersion: '26.3',   isUpToDate: false, daysRemaining: 3,    diskOk: true, uptimeOk: false },
]

/**
 * StaticStatusService — fixed demo data for `--demo`.
 *
 * Nothing on the machine is read and nothing is written; every call returns
 * the same snapshot.
 */
export class StaticStatusService implements IStatusService {
  readonly refreshIntervalMs = 60 * 60_000
  private readonly snapshot: StatusSnapshot

  constructor() {
    this.snapshot = new StatusSnapshotBuilder().build(DEMO_INPUTS, () => DEMO_COLLECTED_AT)
  }

  async getStatus(): Promise<StatusSnapshot> {
    return this.snapshot
  }

  async refresh(): Promise<StatusSnapshot> {
    return this.snapshot
  }

  async getHistory(limit: number): Promise<HistoryEntry[]> {
    return limit <= 0 ? [] : DEMO_HISTORY.slice(-limit)
  }

  watch(onUpdate: (event: StatusUpdateEvent) => void, _onError: (err: unknown) => void): () => void {
    onUpdate({ snapshot: this.snapshot, changed: true })
    return () => {}
  }
}
