import React, { useReducer, useEffect, useCallback } from 'react'
import { Box, Text, useInput, useApp, useStdout } from 'ink'
import chalk from 'chalk'
import type { StatusSnapshot } from '@ddm-status/kernel'
import type { IStatusService } from '../services/index.js'
import { hex } from '../theme.js'
import { DashboardHeader } from './DashboardHeader.js'
import { UpdatePanel } from './UpdatePanel.js'
import { SystemPanel } from './SystemPanel.js'
import { SupportPanel } from './SupportPanel.js'

// ─── State ───────────────────────────────────────────────────────────────────

export type StatusViewState =
  | { phase: 'loading' }
  | { phase: 'ready'; snapshot: StatusSnapshot; refreshing: boolean; error: string | null }
  | { phase: 'error'; message: string }

export type StatusViewAction =
  | { type: 'LOADED'; snapshot: StatusSnapshot }
  | { type: 'REFRESHING' }
  | { type: 'ERROR'; message: string }

/**
 * A failed refresh after the first success keeps the last snapshot on
 * screen and shows the error in the status bar.
 */
export function reducer(prev: StatusViewState, action: StatusViewAction): StatusViewState {
  switch (action.type) {
    case 'LOADED':
      return { phase: 'ready', snapshot: action.snapshot, refreshing: false, error: null }
    case 'REFRESHING':
      return prev.phase === 'ready' ? { ...prev, refreshing: true } : { phase: 'loading' }
    case 'ERROR':
      return prev.phase === 'ready'
        ? { ...prev, refreshing: false, error: action.message }
        : { phase: 'error', message: action.message }
  }
}

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err))

// ─── Component ───────────────────────────────────────────────────────────────

export interface StatusViewProps {
  service: IStatusService
}

/**
 * StatusView — full-screen Ink status dashboard.
 *
 * Refreshes on mount and then on the service's interval.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   r           → refresh now
 */
export function StatusView({ service }: StatusViewProps): React.ReactElement {
  const { exit } = useApp()
  const [state, dispatch] = useReducer(reducer, { phase: 'loading' })
  const { stdout } = useStdout()

  useEffect(() => {
    const stop = service.watch(
      ({ snapshot }) => { dispatch({ type: 'LOADED', snapshot }) },
      (err) => { dispatch({ type: 'ERROR', message: messageOf(err) }) },
    )
    return stop
  }, [service])

  const refresh = useCallback(() => {
    dispatch({ type: 'REFRESHING' })
    service.refresh()
      .then(snapshot => { dispatch({ type: 'LOADED', snapshot }) })
      .catch((err: unknown) => { dispatch({ type: 'ERROR', message: messageOf(err) }) })
  }, [service])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit()
      return
    }
    if (input === 'r') {
      refresh()
    }
  })

  if (state.phase === 'loading') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.blue}>◈ DDM STATUS</Text>
        <Text color={hex.dim}>reading status…</Text>
      </Box>
    )
  }

  if (state.phase === 'error') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.red}>error reading status: {state.message}</Text>
        <Text color={hex.dim}>press r to retry or q to exit</Text>
      </Box>
    )
  }

  const { snapshot } = state
  const cols = stdout.columns ?? 80
  const minutes = Math.round(service.refreshIntervalMs / 60_000)

  const slLeft = state.error !== null
    ? ` ✗ refresh failed: ${state.error}`
    : state.refreshing
      ? ' ◈ refreshing…'
      : ` ◈ updated ${snapshot.collectedAt} · every ${minutes} min`
  const slRight = 'q quit · r refresh '
  const slFill = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine = (state.error !== null ? chalk.bgHex(hex.red) : chalk.bgHex(hex.blueDim))
    .white(slLeft + slFill + slRight)

  return (
    <Box flexDirection="column">
      <DashboardHeader snapshot={snapshot} />

      <Box flexDirection="row">
        <UpdatePanel snapshot={snapshot} />
        <SystemPanel snapshot={snapshot} />
      </Box>

      <SupportPanel snapshot={snapshot} />

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
