#!/usr/bin/env node
/**
 * bin/ddm-status.ts — TTY-aware entry point for the `ddm-status` command.
 *
 * In a TTY, with no arguments and DDM_STATUS_NO_TUI unset: opens the dashboard.
 * Otherwise: delegates to Commander (non-interactive / scripting mode).
 *
 * ddm-status (in TTY)                → dashboard
 * DDM_STATUS_NO_TUI=1 ddm-status     → Commander help
 * ddm-status status --json           → Commander
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['DDM_STATUS_NO_TUI'] === undefined
const hasArgs       = process.argv.length > 2

if (isInteractive && !hasArgs) {
  const { launchDashboard } = await import('../commands/dashboard.js')
  const { reportFailure } = await import('../commands/options.js')
  await launchDashboard({}).catch(reportFailure)
} else {
  const { program } = await import('../commands/index.js')
  await program.parseAsync()
}
