/**
 * DDM Status Kernel — Install Log Enforcement Parser
 *
 * Extracts the most recent enforcement entry from install log text.
 * The line format consumed is fixed:
 *
 *   ...|EnforcedInstallDate:2026-03-13T12:00:00|VersionString:26.3|...
 *
 * Policy: a missing, partial or malformed entry is not an error. It means
 * "no pending enforced update" and the parser returns null. Nothing in this
 * module throws.
 *
 * This module is side-effect free; callers obtain the log text themselves.
 */

import { parseLocalDateTime } from '../time/local-date-time.js';
import { parseVersion } from '../version/compare.js';
import type { EnforcementRecord } from '../types/enforcement.js';

/** Substring that marks a line as an enforcement entry. */
export const ENFORCEMENT_LINE_MARKER = 'EnforcedInstallDate';

const DEADLINE_FIELD = 'EnforcedInstallDate:';
const VERSION_FIELD = 'VersionString:';
const FIELD_SEPARATOR = '|';

/** LF, VT, FF, CR, NEL, LS and PS all end a line. */
const NEWLINES = /[\n\v\f\r\u0085\u2028\u2029]/;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Find the last enforcement entry in the log and parse it.
 *
 * Lines are scanned from the end of the text. The first line met that
 * contains `EnforcedInstallDate` is the only candidate: if it turns out to
 * be malformed, earlier entries are not consulted.
 *
 * @returns the parsed record, or null when there is no usable entry
 */
export function parseLatestEnforcement(logText: string): EnforcementRecord | null {
  const line = findLastEnforcementLine(logText);
  if (line === null) return null;
  return parseEnforcementLine(line);
}

/**
 * Parse a single enforcement line.
 *
 * Returns null when either field marker is absent, when the deadline is not
 * followed by a `|`, or when the deadline is not a valid
 * `YYYY-MM-DDTHH:MM:SS` wall-clock time.
 */
export function parseEnforcementLine(line: string): EnforcementRecord | null {
  const deadlineText = fieldUpToSeparator(line, DEADLINE_FIELD);
  if (deadlineText === null) return null;

  const versionStart = line.indexOf(VERSION_FIELD);
  if (versionStart === -1) return null;

  const deadline = parseLocalDateTime(deadlineText);
  if (deadline === null) return null;

  const afterVersion = line.slice(versionStart + VERSION_FIELD.length);
  const separator = afterVersion.indexOf(FIELD_SEPARATOR);
  // Only the unterminated (end-of-line) form is trimmed.
  const requiredVersion = separator === -1
    ? afterVersion.trim()
    : afterVersion.slice(0, separator);

  return {
    deadline,
    requiredVersion,
    requiredVersionParts: parseVersion(requiredVersion),
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Backward scan with early exit; large logs carry their newest entries last.
 *
 * @internal
 */
function findLastEnforcementLine(logText: string): string | null {
  const lines = logText.split(NEWLINES);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (line !== undefined && line.includes(ENFORCEMENT_LINE_MARKER)) {
      return line;
    }
  }
  return null;
}

/**
 * Text after `field` up to (not including) the next `|`.
 * Null if the field is absent or unterminated.
 *
 * @internal
 */
function fieldUpToSeparator(line: string, field: string): string | null {
  const start = line.indexOf(field);
  if (start === -1) return null;
  const rest = line.slice(start + field.length);
  const end = rest.indexOf(FIELD_SEPARATOR);
  return end === -1 ? null : rest.slice(0, end);
}
