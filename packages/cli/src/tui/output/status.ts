import { SOFTWARE_UPDATE_URL, formatLocalDateTime, toDate } from '@ddm-status/kernel'
import type { LocalDateTime, StatusSnapshot, SupportAction } from '@ddm-status/kernel'
import { t, urgencyColor } from '../theme.js'

export interface RenderOptions {
  /** BCP 47 locale for the deadline; the process default when absent. */
  locale?: string | undefined
}

// ─── Formatters ──────────────────────────────────────────────────────────────

export function formatDeadline(deadline: LocalDateTime, locale?: string): string {
  return new Intl.DateTimeFormat(locale, { dateStyle: 'long', timeStyle: 'short' })
    .format(toDate(deadline))
}

export function formatDays(days: number): string {
  return days === 1 ? '1 day' : `${days} days`
}

export function formatDisk(freeGB: number, freePercent: number): string {
  return `${freeGB.toFixed(1)} GB (${freePercent.toFixed(0)}%)`
}

export function formatReboot(daysSinceReboot: number): string {
  return daysSinceReboot === 0 ? 'today' : `${daysSinceReboot} day(s) ago`
}

const pad = (s: string, width: number): string => s + ' '.repeat(Math.max(1, width - s.length))

// ─── Full status ─────────────────────────────────────────────────────────────

/**
 * renderStatus — the full human-readable status, as printed by `status`.
 *
 *   ⬇ Update required  3 days left
 *   installed  26.2
 *
 *   update
 *     required version  26.3
 *     deadline          March 13, 2026 at 12:00 PM
 *     days remaining    3
 *     ✓ update downloaded
 *   …
 */
export function renderStatus(snapshot: StatusSnapshot, opts: RenderOptions = {}): string {
  const { enforcement, badge, disk, uptime } = snapshot
  const color = urgencyColor(badge.urgency)
  const days = enforcement.daysRemaining

  let out = '\n'

  if (enforcement.isUpToDate) {
    out += '  ' + t.green('✓ macOS is up to date') + '\n'
  } else {
    const left = days === null ? '' : '  ' + color(formatDays(days) + ' left')
    out += '  ' + color('⬇ Update required') + left + '\n'
  }
  out += '  ' + t.muted('installed  ') + t.white(snapshot.installedVersion) + '\n'

  if (!enforcement.isUpToDate) {
    const record = enforcement.record
    out += '\n  ' + t.muted('update') + '\n'
    out += '    ' + t.muted(pad('required version', 18)) + t.white(record?.requiredVersion ?? '–') + '\n'
    out += '    ' + t.muted(pad('deadline', 18)) +
      t.text(record === null ? '–' : formatDeadline(record.deadline, opts.locale)) + '\n'
    out += '    ' + t.muted(pad('days remaining', 18)) + color(days === null ? '–' : String(days)) + '\n'
    if (snapshot.updateStaged) {
      out += '    ' + t.green('✓') + ' ' + t.text('update downloaded') + '\n'
    }
  }

  out += '\n  ' + t.muted('system') + '\n'
  out += '    ' + (disk.ok ? t.green('✓') : t.red('✗')) + ' ' + t.text(pad('disk space', 14)) +
    t.muted(formatDisk(disk.freeGB, disk.freePercent)) + '\n'
  out += '    ' + (uptime.ok ? t.green('✓') : t.amber('⚠')) + ' ' + t.text(pad('last reboot', 14)) +
    t.muted(formatReboot(uptime.daysSinceReboot)) + '\n'

  if (!enforcement.isUpToDate) {
    out += '\n  ' + t.blue(pad('open software update', 22)) + t.blueDim(SOFTWARE_UPDATE_URL) + '\n'
  }

  out += '\n' + renderSupportBlock(snapshot.preferences.supportTeamName, snapshot.supportActions)
  return out
}

export function renderSupportBlock(teamName: string, actions: ReadonlyArray<SupportAction>): string {
  let out = '  ' + t.muted(teamName) + '\n'
  if (actions.length === 0) {
    out += '    ' + t.dim('no contact details configured') + '\n'
  }
  for (const action of actions) {
    out += '    ' + t.text(pad(action.label, 24)) + t.blueDim(action.target) + '\n'
  }
  return out
}

// ─── One-line summary ────────────────────────────────────────────────────────

/**
 * renderStatusLine — one line per refresh for `watch`.
 *
 *   2026-03-10T08:00:00.000Z  3 days left  26.2 → 26.3
 */
export function renderStatusLine(snapshot: StatusSnapshot): string {
  const { enforcement, badge } = snapshot
  const at = t.dim(snapshot.collectedAt)

  if (enforcement.isUpToDate) {
    return at + '  ' + t.green('✓ up to date') + '  ' + t.white(snapshot.installedVersion)
  }

  const color = urgencyColor(badge.urgency)
  const state = enforcement.daysRemaining === null
    ? 'update required'
    : formatDays(enforcement.daysRemaining) + ' left'
  const target = enforcement.record?.requiredVersion ?? '–'
  return at + '  ' + color(state) + '  ' + t.white(snapshot.installedVersion + ' → ' + target)
}

// ─── JSON ────────────────────────────────────────────────────────────────────

export interface StatusJson {
  installed_version: string
  required_version: string | null
  deadline: string | null
  is_up_to_date: boolean
  days_remaining: number | null
  urgency: string
  badge: string
  update_staged: boolean
  disk: { free_gb: number; free_percent: number; ok: boolean }
  uptime: { days_since_reboot: number; ok: boolean }
  support: {
    team_name: string
    actions: Array<{ kind: string; label: string; target: string }>
  }
  software_update_url: string | null
  collected_at: string
}

/** statusJson — the `status --json` document. Deadline as local `YYYY-MM-DDTHH:MM:SS`. */
export function statusJson(snapshot: StatusSnapshot): StatusJson {
  const { enforcement, disk, uptime } = snapshot
  const record = enforcement.record
  return {
    installed_version: snapshot.installedVersion,
    required_version: record?.requiredVersion ?? null,
    deadline: record === null ? null : formatLocalDateTime(record.deadline),
    is_up_to_date: enforcement.isUpToDate,
    days_remaining: enforcement.daysRemaining,
    urgency: snapshot.badge.urgency,
    badge: snapshot.badge.text,
    update_staged: snapshot.updateStaged,
    disk: { free_gb: disk.freeGB, free_percent: disk.freePercent, ok: disk.ok },
    uptime: { days_since_reboot: uptime.daysSinceReboot, ok: uptime.ok },
    support: {
      team_name: snapshot.preferences.supportTeamName,
      actions: snapshot.supportActions.map((a) => ({ kind: a.kind, label: a.label, target: a.target })),
    },
    software_update_url: enforcement.isUpToDate ? null : SOFTWARE_UPDATE_URL,
    collected_at: snapshot.collectedAt,
  }
}
