/**
 * DDM Status Kernel — Enforcement Parser Tests
 *
 *   ENF-U1: a well-formed entry yields deadline and required version
 *   ENF-U2: only the last enforcement line in document order is used
 *   ENF-U3: a log without the marker yields no record
 *   ENF-U4: partial or malformed entries yield no record (never throw)
 *   ENF-U5: version text extraction (terminated vs end of line)
 *
 * Tests are pure: no I/O, no state, no clock dependency.
 */

import { describe, it, expect } from 'vitest';
import { parseLatestEnforcement, parseEnforcementLine } from '../src/enforcement/parser.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function entry(deadline: string, version: string): string {
  return `2026-03-01 09:12:44+01 host softwareupdated[412]: Declaration ` +
    `|EnforcedInstallDate:${deadline}|VersionString:${version}|Details:none|`;
}

const NOISE = [
  '2026-03-01 09:00:01+01 host installd[301]: PackageKit: Extracting bundle',
  '2026-03-01 09:00:02+01 host softwareupdated[412]: Scan complete',
];

// ---------------------------------------------------------------------------
// ENF-U1
// ---------------------------------------------------------------------------

describe('parseLatestEnforcement — ENF-U1: well-formed entry', () => {
  it('extracts the deadline and the required version', () => {
    const log = [...NOISE, entry('2026-03-13T12:00:00', '26.3')].join('\n');

    const record = parseLatestEnforcement(log);

    expect(record).toEqual({
      deadline: { year: 2026, month: 3, day: 13, hour: 12, minute: 0, second: 0 },
      requiredVersion: '26.3',
      requiredVersionParts: [26, 3],
    });
  });

  it('parses the bare field form', () => {
    const record = parseLatestEnforcement('|EnforcedInstallDate:2026-03-13T12:00:00|VersionString:26.3|');
    expect(record?.requiredVersion).toBe('26.3');
    expect(record?.deadline.day).toBe(13);
  });

  it('accepts CRLF line endings', () => {
    const log = [NOISE[0], entry('2026-04-02T08:00:00', '15.7.4'), NOISE[1]].join('\r\n');
    expect(parseLatestEnforcement(log)?.requiredVersion).toBe('15.7.4');
  });
});

// ---------------------------------------------------------------------------
// ENF-U2
// ---------------------------------------------------------------------------

describe('parseLatestEnforcement — ENF-U2: last entry wins', () => {
  it('uses the last enforcement line even when earlier ones differ', () => {
    const log = [
      entry('2026-01-10T12:00:00', '26.1'),
      ...NOISE,
      entry('2026-02-10T12:00:00', '26.2'),
      NOISE[0],
      entry('2026-03-13T12:00:00', '26.3'),
      NOISE[1],
    ].join('\n');

    const record = parseLatestEnforcement(log);

    expect(record?.requiredVersion).toBe('26.3');
    expect(record?.deadline.month).toBe(3);
  });

  it('does not fall back to an earlier entry when the last one is malformed', () => {
    const log = [
      entry('2026-02-10T12:00:00', '26.2'),
      entry('not-a-date', '26.3'),
    ].join('\n');

    expect(parseLatestEnforcement(log)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// ENF-U3
// ---------------------------------------------------------------------------

describe('parseLatestEnforcement — ENF-U3: no marker', () => {
  it('returns null for an empty log', () => {
    expect(parseLatestEnforcement('')).toBeNull();
  });

  it('returns null when no line mentions EnforcedInstallDate', () => {
    expect(parseLatestEnforcement(NOISE.join('\n'))).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// ENF-U4
// ---------------------------------------------------------------------------

describe('parseLatestEnforcement — ENF-U4: malformed entries', () => {
  it('returns null for a malformed date', () => {
    expect(parseLatestEnforcement('EnforcedInstallDate:not-a-date|VersionString:1.0|')).toBeNull();
  });

  it('returns null when VersionString is missing', () => {
    expect(parseLatestEnforcement('|EnforcedInstallDate:2026-03-13T12:00:00|Other:1|')).toBeNull();
  });

  it('returns null when the marker appears without its colon', () => {
    expect(parseLatestEnforcement('EnforcedInstallDate pending |VersionString:26.3|')).toBeNull();
  });

  it('returns null when the deadline is not followed by a separator', () => {
    expect(parseLatestEnforcement('VersionString:26.3|EnforcedInstallDate:2026-03-13T12:00:00')).toBeNull();
  });

  it('returns null for a timezone-qualified deadline', () => {
    expect(parseLatestEnforcement('|EnforcedInstallDate:2026-03-13T12:00:00Z|VersionString:26.3|')).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// ENF-U5
// ---------------------------------------------------------------------------

describe('parseEnforcementLine — ENF-U5: version text', () => {
  it('takes the version up to the next separator without trimming', () => {
    const record = parseEnforcementLine('|EnforcedInstallDate:2026-03-13T12:00:00|VersionString: 26.3 |');
    expect(record?.requiredVersion).toBe(' 26.3 ');
    expect(record?.requiredVersionParts).toEqual([]);
  });

  it('takes the rest of the line, trimmed, when no separator follows', () => {
    const record = parseEnforcementLine('|EnforcedInstallDate:2026-03-13T12:00:00|VersionString:26.3.1  ');
    expect(record?.requiredVersion).toBe('26.3.1');
    expect(record?.requiredVersionParts).toEqual([26, 3, 1]);
  });

  it('finds VersionString even when it precedes the deadline field', () => {
    const record = parseEnforcementLine('|VersionString:15.7|EnforcedInstallDate:2026-05-01T00:00:00|');
    expect(record?.requiredVersion).toBe('15.7');
    expect(record?.deadline.month).toBe(5);
  });

  it('accepts an empty version', () => {
    const record = parseEnforcementLine('|EnforcedInstallDate:2026-03-13T12:00:00|VersionString:|');
    expect(record?.requiredVersion).toBe('');
    expect(record?.requiredVersionParts).toEqual([]);
  });
});
