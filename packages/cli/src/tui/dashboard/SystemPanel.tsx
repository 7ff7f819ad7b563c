import React from 'react'
import { Text } from 'ink'
import type { StatusSnapshot } from '@ddm-status/kernel'
import { Panel, Row } from './Panel.js'
import { hex } from '../theme.js'
import { formatDisk, formatReboot } from '../output/status.js'

interface SystemPanelProps {
  snapshot: StatusSnapshot
}

/**
 * SystemPanel — disk space and time since reboot against the configured
 * thresholds.
 */
export function SystemPanel({ snapshot }: SystemPanelProps): React.ReactElement {
  const { disk, uptime } = snapshot
  const healthy = disk.ok && uptime.ok

  return (
    <Panel label="System" meta={healthy ? 'ok' : 'attention'} accent={healthy ? undefined : hex.amber}>
      <Row label={(disk.ok ? '✓' : '✗') + ' disk space'}>
        <Text color={disk.ok ? hex.text : hex.red}>{formatDisk(disk.freeGB, disk.freePercent)}</Text>
      </Row>
      <Row label={(uptime.ok ? '✓' : '⚠') + ' last reboot'}>
        <Text color={uptime.ok ? hex.text : hex.amber}>{formatReboot(uptime.daysSinceReboot)}</Text>
      </Row>
    </Panel>
  )
}
