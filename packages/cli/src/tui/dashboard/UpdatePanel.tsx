import React from 'react'
import { Text } from 'ink'
import { SOFTWARE_UPDATE_URL } from '@ddm-status/kernel'
import type { StatusSnapshot } from '@ddm-status/kernel'
import { Panel, Row } from './Panel.js'
import { hex, urgencyHex } from '../theme.js'
import { formatDeadline } from '../output/status.js'

interface UpdatePanelProps {
  snapshot: StatusSnapshot
}

/**
 * UpdatePanel — the enforced update: required version, deadline, days left,
 * whether it is already downloaded.
 */
export function UpdatePanel({ snapshot }: UpdatePanelProps): React.ReactElement {
  const { enforcement, badge } = snapshot
  const record = enforcement.record

  if (enforcement.isUpToDate) {
    return (
      <Panel label="Update" meta="none pending" accent={hex.green}>
        <Text color={hex.green}>✓ no enforced update is pending</Text>
      </Panel>
    )
  }

  const color = urgencyHex(badge.urgency)
  const days = enforcement.daysRemaining

  return (
    <Panel label="Update" meta={badge.urgency} accent={color}>
      <Row label="required version">
        <Text color={hex.white}>{record?.requiredVersion ?? '–'}</Text>
      </Row>
      <Row label="deadline">
        <Text color={hex.text}>{record === null ? '–' : formatDeadline(record.deadline)}</Text>
      </Row>
      <Row label="days remaining">
        <Text color={color} bold>{days === null ? '–' : String(days)}</Text>
      </Row>
      {snapshot.updateStaged && (
        <Text color={hex.green}>✓ update downloaded</Text>
      )}
      <Text color={hex.blueDim}>{SOFTWARE_UPDATE_URL}</Text>
    </Panel>
  )
}
