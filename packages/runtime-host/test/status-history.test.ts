/**
 * DDM Status Runtime Host — StateIO and Status History Tests
 *
 *   SIO-U1: MemoryStateIO and FileStateIO share the readLogRaw contract
 *   ULID-U1: ids are 26 Crockford characters and monotonic within a millisecond
 *   HIST-U1: the sink writes one JSON line per snapshot
 *   HIST-U2: the reader drops invalid lines, duplicates and a torn final line
 *   HIST-U3: output is sorted by timestamp then event_id
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_PREFERENCES, StatusSnapshotBuilder } from '@ddm-status/kernel';
import type { StatusSnapshot } from '@ddm-status/kernel';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import { createUlidGenerator } from '../src/logging/ulid.js';
import {
  STATUS_LOG,
  StatusHistorySink,
  latestEvents,
  readStatusHistory,
} from '../src/logging/status-history.js';
import type { StatusEvent } from '../src/logging/status-history.js';

const LOG_LINE =
  '2026-03-01 10:00:00-08 host softwareupdated[1]: EnforcedInstallDate:2026-03-20T09:00:00|VersionString:26.3|';

function snapshot(logText: string, collectedAt = '2026-03-14T17:00:00.000Z'): StatusSnapshot {
  return new StatusSnapshotBuilder().build(
    {
      installedVersion: '26.2',
      logText,
      now: { year: 2026, month: 3, day: 14, hour: 10, minute: 0, second: 0 },
      disk: { availableBytes: 50, totalBytes: 100 },
      uptimeSeconds: 86_400,
      updateStaged: false,
      preferences: DEFAULT_PREFERENCES,
    },
    () => collectedAt,
  );
}

function event(id: string, timestamp: string): StatusEvent {
  return {
    event_id: id,
    timestamp,
    installed_version: '26.2',
    required_version: null,
    is_up_to_date: true,
    days_remaining: null,
    disk_ok: true,
    uptime_ok: true,
  };
}

const ID_A = '01J00000000000000000000000';
const ID_B = '01J00000000000000000000001';
const ID_C = '01J00000000000000000000002';

// ---------------------------------------------------------------------------
// SIO-U1
// ---------------------------------------------------------------------------

describe('StateIO — SIO-U1: readLogRaw contract', () => {
  it('MemoryStateIO: unwritten log is empty', () => {
    expect(new MemoryStateIO().readLogRaw(STATUS_LOG)).toBe('');
  });

  it('MemoryStateIO: lines are newline-terminated', () => {
    const io = new MemoryStateIO();
    io.appendLine(STATUS_LOG, 'a');
    io.appendLine(STATUS_LOG, 'b');
    expect(io.readLogRaw(STATUS_LOG)).toBe('a\nb\n');
  });

  it('FileStateIO: missing log is empty, appended lines land under logs/', () => {
    const home = mkdtempSync(join(tmpdir(), 'ddm-status-state-'));
    const io = new FileStateIO(home);
    expect(io.readLogRaw(STATUS_LOG)).toBe('');

    io.appendLine(STATUS_LOG, 'a');
    io.appendLine(STATUS_LOG, 'b');

    expect(readFileSync(join(home, 'logs', STATUS_LOG), 'utf-8')).toBe('a\nb\n');
    expect(io.readLogRaw(STATUS_LOG)).toBe('a\nb\n');
  });
});

// ---------------------------------------------------------------------------
// ULID-U1
// ---------------------------------------------------------------------------

describe('createUlidGenerator — ULID-U1', () => {
  it('encodes time then randomness in Crockford Base32', () => {
    const next = createUlidGenerator(() => 0, () => BigInt(0));
    expect(next()).toBe('00000000000000000000000000');
  });

  it('increments the random part within one millisecond', () => {
    const next = createUlidGenerator(() => 1, () => BigInt(30));
    expect(next()).toBe('0000000001000000000000000Y');
    expect(next()).toBe('0000000001000000000000000Z');
    expect(next()).toBe('00000000010000000000000010');
  });

  it('re-rolls when the millisecond advances', () => {
    let t = 1;
    const next = createUlidGenerator(() => t, () => BigInt(5));
    next();
    t = 2;
    expect(next()).toBe('00000000020000000000000005');
  });

  it('keeps the random part within 80 bits', () => {
    const max = (BigInt(1) << BigInt(80)) - BigInt(1);
    const next = createUlidGenerator(() => 1, () => max);
    expect(next()).toBe('0000000001' + 'Z'.repeat(16));
    expect(next()).toBe('0000000001' + 'Z'.repeat(16));

    const wide = createUlidGenerator(() => 1, () => BigInt(1) << BigInt(80));
    expect(wide()).toBe('0000000001' + '0'.repeat(16));
  });

  it('default generator yields 26 valid characters', () => {
    expect(createUlidGenerator()()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });
});

// ---------------------------------------------------------------------------
// HIST-U1
// ---------------------------------------------------------------------------

describe('StatusHistorySink — HIST-U1', () => {
  it('records the enforcement outcome of a snapshot', () => {
    const io = new MemoryStateIO();
    const sink = new StatusHistorySink(io, () => ID_A);

    sink.append(snapshot(LOG_LINE));

    const lines = io.readLines(STATUS_LOG);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      event_id: ID_A,
      timestamp: '2026-03-14T17:00:00.000Z',
      installed_version: '26.2',
      required_version: '26.3',
      is_up_to_date: false,
      days_remaining: 6,
      disk_ok: true,
      uptime_ok: true,
    });
  });

  it('records nulls when no enforcement is present', () => {
    const io = new MemoryStateIO();
    const written = new StatusHistorySink(io, () => ID_B).append(snapshot(''));
    expect(written.required_version).toBeNull();
    expect(written.days_remaining).toBeNull();
    expect(written.is_up_to_date).toBe(true);
  });

  it('what the sink writes the reader reads back', () => {
    const io = new MemoryStateIO();
    const written = new StatusHistorySink(io, () => ID_C).append(snapshot(LOG_LINE));
    expect(readStatusHistory(io.readLogRaw(STATUS_LOG)).events).toEqual([written]);
  });
});

// ---------------------------------------------------------------------------
// HIST-U2 / HIST-U3
// ---------------------------------------------------------------------------

describe('readStatusHistory — HIST-U2: damaged logs', () => {
  it('empty content yields no events', () => {
    expect(readStatusHistory('')).toEqual({
      events: [],
      stats: { totalLines: 0, parsedEvents: 0, duplicates: 0, invalidLines: 0, partialTrailingLine: false },
    });
  });

  it('drops non-JSON and wrongly shaped lines', () => {
    const raw = [
      'not json',
      JSON.stringify({ event_id: ID_A }),
      JSON.stringify(event(ID_B, '2026-03-14T00:00:00.000Z')),
      '',
    ].join('\n');
    const { events, stats } = readStatusHistory(raw);
    expect(events.map((e) => e.event_id)).toEqual([ID_B]);
    expect(stats.invalidLines).toBe(2);
    expect(stats.totalLines).toBe(3);
  });

  it('keeps the first occurrence of a repeated event_id', () => {
    const first = event(ID_A, '2026-03-14T00:00:00.000Z');
    const second = { ...first, installed_version: '26.3' };
    const raw = JSON.stringify(first) + '\n' + JSON.stringify(second) + '\n';
    const { events, stats } = readStatusHistory(raw);
    expect(events).toEqual([first]);
    expect(stats.duplicates).toBe(1);
  });

  it('drops a final line with no newline', () => {
    const whole = JSON.stringify(event(ID_A, '2026-03-14T00:00:00.000Z'));
    const { events, stats } = readStatusHistory(whole + '\n{"event_id":"01J');
    expect(events).toHaveLength(1);
    expect(stats.partialTrailingLine).toBe(true);
    expect(stats.invalidLines).toBe(0);
  });
});

describe('readStatusHistory — HIST-U3: ordering', () => {
  it('sorts by timestamp, then event_id', () => {
    const raw = [
      event(ID_C, '2026-03-15T00:00:00.000Z'),
      event(ID_B, '2026-03-14T00:00:00.000Z'),
      event(ID_A, '2026-03-14T00:00:00.000Z'),
    ]
      .map((e) => JSON.stringify(e) + '\n')
      .join('');
    expect(readStatusHistory(raw).events.map((e) => e.event_id)).toEqual([ID_A, ID_B, ID_C]);
  });

  it('latestEvents keeps the newest entries in chronological order', () => {
    const raw = [ID_A, ID_B, ID_C]
      .map((id, i) => JSON.stringify(event(id, `2026-03-1${i}T00:00:00.000Z`)) + '\n')
      .join('');
    const history = readStatusHistory(raw);
    expect(latestEvents(history, 2).map((e) => e.event_id)).toEqual([ID_B, ID_C]);
    expect(latestEvents(history, 0)).toEqual([]);
  });
});
