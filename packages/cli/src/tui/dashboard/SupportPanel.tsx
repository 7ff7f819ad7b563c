import React from 'react'
import { Text } from 'ink'
import type { StatusSnapshot } from '@ddm-status/kernel'
import { Panel, Row } from './Panel.js'
import { hex } from '../theme.js'

interface SupportPanelProps {
  snapshot: StatusSnapshot
}

export function SupportPanel({ snapshot }: SupportPanelProps): React.ReactElement {
  const actions = snapshot.supportActions

  return (
    <Panel label="Support" meta={snapshot.preferences.supportTeamName}>
      {actions.length === 0 && (
        <Text color={hex.dim}>no contact details configured</Text>
      )}
      {actions.map(action => (
        <Row key={action.kind} label={action.label}>
          <Text color={hex.blueDim}>{action.target}</Text>
        </Row>
      ))}
    </Panel>
  )
}
