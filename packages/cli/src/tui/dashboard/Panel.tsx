import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'

interface PanelProps {
  label: string
  meta?: string | undefined
  /** Border colour; the neutral border when absent. */
  accent?: string | undefined
  flexGrow?: number
  children: React.ReactNode
}

/**
 * Panel — bordered section of the status dashboard.
 *
 * Label row: uppercase label + right-aligned meta.
 */
export function Panel({ label, meta, accent, flexGrow = 1, children }: PanelProps): React.ReactElement {
  return (
    <Box
      flexGrow={flexGrow}
      flexDirection="column"
      borderStyle="single"
      borderColor={accent ?? hex.border}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text color={hex.blue}>{label.toUpperCase()}</Text>
        {meta !== undefined && (
          <Text color={hex.muted}>{meta}</Text>
        )}
      </Box>

      {children}
    </Box>
  )
}

export function Row({ label, children }: { label: string; children: React.ReactNode }): React.ReactElement {
  return (
    <Box justifyContent="space-between" gap={2}>
      <Text color={hex.muted}>{label}</Text>
      {children}
    </Box>
  )
}
