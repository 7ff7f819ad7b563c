import type { HistoryEntry } from '../services/index.js'
import { t } from '../theme.js'

/**
 * renderHistory — recorded refreshes, oldest first.
 *
 *   2026-03-10T08:00:00.000Z  pending     26.2 → 26.3  3
 */
export function renderHistory(entries: ReadonlyArray<HistoryEntry>): string {
  if (entries.length === 0) {
    return '\n  ' + t.dim('no status history recorded yet') + '\n'
  }

  let out = '\n'
  for (const e of entries) {
    const state = e.isUpToDate ? t.green('up to date') + ' ' : t.amber('pending') + '    '
    const versions = e.requiredVersion === null
      ? e.installedVersion
      : `${e.installedVersion} → ${e.requiredVersion}`
    const days = e.daysRemaining === null ? '–' : String(e.daysRemaining)
    const health = (e.diskOk ? '' : '  ' + t.red('disk')) + (e.uptimeOk ? '' : '  ' + t.amber('reboot'))
    out += '  ' + t.dim(e.timestamp) + '  ' + state + ' ' + t.white(versions) + '  ' + t.text(days) + health + '\n'
  }
  return out
}
