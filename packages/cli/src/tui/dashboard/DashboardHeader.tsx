import React from 'react'
import { Box, Text } from 'ink'
import type { StatusSnapshot } from '@ddm-status/kernel'
import { hex, urgencyHex } from '../theme.js'
import { formatDays } from '../output/status.js'

interface DashboardHeaderProps {
  snapshot: StatusSnapshot
}

/**
 * DashboardHeader — headline row.
 *
 * [3] Update required · 3 days left · installed 26.2      q quit · r refresh
 */
export function DashboardHeader({ snapshot }: DashboardHeaderProps): React.ReactElement {
  const { enforcement, badge } = snapshot
  const color = urgencyHex(badge.urgency)
  const headline = enforcement.isUpToDate ? 'macOS is up to date' : 'Update required'
  const days = enforcement.daysRemaining

  return (
    <Box justifyContent="space-between" paddingX={1} borderStyle="single" borderColor={hex.border}>
      <Box gap={1}>
        <Text color={color} bold inverse>{` ${badge.text} `}</Text>
        <Text color={color} bold>{headline}</Text>
        {!enforcement.isUpToDate && days !== null && (
          <>
            <Text color={hex.dim}>·</Text>
            <Text color={color}>{formatDays(days) + ' left'}</Text>
          </>
        )}
        <Text color={hex.dim}>·</Text>
        <Text color={hex.muted}>
          {'installed '}
          <Text color={hex.white}>{snapshot.installedVersion}</Text>
        </Text>
      </Box>

      <Text color={hex.dim}>q quit · r refresh</Text>
    </Box>
  )
}
