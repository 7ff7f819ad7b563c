/**
 * DDM Status Runtime Host — Collector Tests
 *
 *   PREF-U1: managed file wins over the local file, even when invalid
 *   PREF-U2: each key falls back to its default independently
 *   PREF-U3: no files → defaults
 *   FILE-U1: install log and staged marker degrade to their "no signal" values
 *   VER-U1: sw_vers output is trimmed; failures yield the placeholder
 *
 * Isolation: file tests use temp dirs; version tests use a fake ExecAdapter.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_PREFERENCES } from '@ddm-status/kernel';
import { loadPreferences, parsePreferences } from '../src/collectors/preferences.js';
import { isUpdateStaged, readInstallLog, sampleDisk } from '../src/collectors/files.js';
import { readInstalledVersion, VERSION_PLACEHOLDER } from '../src/collectors/os-version.js';
import type { ExecAdapter, ExecResult } from '../src/adapters/exec.js';
import { silentLogger } from '../src/logging/logger.js';

const logger = silentLogger();

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'ddm-status-collect-'));
}

// ---------------------------------------------------------------------------
// PREF-U1 / PREF-U3
// ---------------------------------------------------------------------------

describe('loadPreferences — PREF-U1/U3: file priority', () => {
  it('reads the managed file when both exist', async () => {
    const dir = tempDir();
    const managedPath = join(dir, 'managed.json');
    const localPath = join(dir, 'local.json');
    writeFileSync(managedPath, JSON.stringify({ SupportTeamName: 'Service Desk' }));
    writeFileSync(localPath, JSON.stringify({ SupportTeamName: 'Local Team' }));

    const loaded = await loadPreferences({ managedPath, localPath }, logger);

    expect(loaded.source).toBe('managed');
    expect(loaded.path).toBe(managedPath);
    expect(loaded.preferences.supportTeamName).toBe('Service Desk');
  });

  it('an unparsable managed file still shadows the local file', async () => {
    const dir = tempDir();
    const managedPath = join(dir, 'managed.json');
    const localPath = join(dir, 'local.json');
    writeFileSync(managedPath, '{ not json');
    writeFileSync(localPath, JSON.stringify({ SupportTeamName: 'Local Team' }));

    const loaded = await loadPreferences({ managedPath, localPath }, logger);

    expect(loaded.source).toBe('managed');
    expect(loaded.preferences).toEqual(DEFAULT_PREFERENCES);
  });

  it('falls back to the local file without a managed one', async () => {
    const dir = tempDir();
    const localPath = join(dir, 'local.json');
    writeFileSync(localPath, JSON.stringify({ MinimumDiskFreePercentage: 20 }));

    const loaded = await loadPreferences(
      { managedPath: join(dir, 'missing.json'), localPath },
      logger,
    );

    expect(loaded.source).toBe('local');
    expect(loaded.preferences.minimumDiskFreePercentage).toBe(20);
  });

  it('uses defaults when neither file exists', async () => {
    const dir = tempDir();
    const loaded = await loadPreferences(
      { managedPath: join(dir, 'a.json'), localPath: join(dir, 'b.json') },
      logger,
    );
    expect(loaded).toEqual({ preferences: DEFAULT_PREFERENCES, source: 'defaults', path: null });
  });
});

// ---------------------------------------------------------------------------
// PREF-U2
// ---------------------------------------------------------------------------

describe('parsePreferences — PREF-U2: per-key fallback', () => {
  it('maps every key when all are valid', () => {
    const text = JSON.stringify({
      MinimumDiskFreePercentage: 15,
      DaysOfExcessiveUptimeWarning: 0,
      SupportTeamName: 'Help Desk',
      SupportTeamPhone: '+1 555 0100',
      SupportTeamEmail: 'help@example.com',
      SupportTeamWebsite: 'https://help.example.com',
    });
    expect(parsePreferences(text, 'prefs.json', logger)).toEqual({
      minimumDiskFreePercentage: 15,
      daysOfExcessiveUptimeWarning: 0,
      supportTeamName: 'Help Desk',
      supportTeamPhone: '+1 555 0100',
      supportTeamEmail: 'help@example.com',
      supportTeamWebsite: 'https://help.example.com',
    });
  });

  it('a mistyped key falls back alone', () => {
    const text = JSON.stringify({ MinimumDiskFreePercentage: '15', SupportTeamName: 'Help Desk' });
    const prefs = parsePreferences(text, 'prefs.json', logger);
    expect(prefs.minimumDiskFreePercentage).toBe(10);
    expect(prefs.supportTeamName).toBe('Help Desk');
  });

  it('a negative uptime threshold falls back to 7', () => {
    const text = JSON.stringify({ DaysOfExcessiveUptimeWarning: -1 });
    expect(parsePreferences(text, 'prefs.json', logger).daysOfExcessiveUptimeWarning).toBe(7);
  });

  it('a JSON array yields the defaults', () => {
    expect(parsePreferences('[1,2]', 'prefs.json', logger)).toEqual(DEFAULT_PREFERENCES);
  });

  it('an empty file yields the defaults', () => {
    expect(parsePreferences('', 'prefs.json', logger)).toEqual(DEFAULT_PREFERENCES);
  });
});

// ---------------------------------------------------------------------------
// FILE-U1
// ---------------------------------------------------------------------------

describe('file readers — FILE-U1', () => {
  it('returns install log text', async () => {
    const path = join(tempDir(), 'install.log');
    writeFileSync(path, 'line one\nline two\n');
    expect(await readInstallLog(path, logger)).toBe('line one\nline two\n');
  });

  it('a missing install log reads as empty', async () => {
    expect(await readInstallLog(join(tempDir(), 'absent.log'), logger)).toBe('');
  });

  it('reports the staged marker only when it exists', async () => {
    const dir = tempDir();
    const marker = join(dir, 'Prepared');
    expect(await isUpdateStaged(marker)).toBe(false);
    writeFileSync(marker, '');
    expect(await isUpdateStaged(marker)).toBe(true);
  });

  it('samples a real volume with available ≤ total', async () => {
    const sample = await sampleDisk(tmpdir(), logger);
    expect(sample.totalBytes).toBeGreaterThan(0);
    expect(sample.availableBytes).toBeLessThanOrEqual(sample.totalBytes);
  });

  it('an unknown volume yields the zero sample', async () => {
    const sample = await sampleDisk(join(tempDir(), 'no-such-volume'), logger);
    expect(sample).toEqual({ availableBytes: 0, totalBytes: 0 });
  });
});

// ---------------------------------------------------------------------------
// VER-U1
// ---------------------------------------------------------------------------

class FakeExec implements ExecAdapter {
  readonly calls: Array<{ command: string; args: ReadonlyArray<string> }> = [];

  constructor(private readonly outcome: ExecResult | Error) {}

  async run(command: string, args: ReadonlyArray<string>): Promise<ExecResult> {
    this.calls.push({ command, args });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

function versionFrom(exec: ExecAdapter): Promise<string> {
  return readInstalledVersion({ exec, command: '/usr/bin/sw_vers', timeoutMs: 1000, logger });
}

describe('readInstalledVersion — VER-U1', () => {
  it('runs sw_vers -productVersion and trims the output', async () => {
    const exec = new FakeExec({ exitCode: 0, stdout: '26.2\n', stderr: '' });
    expect(await versionFrom(exec)).toBe('26.2');
    expect(exec.calls).toEqual([{ command: '/usr/bin/sw_vers', args: ['-productVersion'] }]);
  });

  it('non-zero exit yields the placeholder', async () => {
    const exec = new FakeExec({ exitCode: 1, stdout: '26.2\n', stderr: 'boom' });
    expect(await versionFrom(exec)).toBe(VERSION_PLACEHOLDER);
  });

  it('blank output yields the placeholder', async () => {
    const exec = new FakeExec({ exitCode: 0, stdout: '  \n', stderr: '' });
    expect(await versionFrom(exec)).toBe(VERSION_PLACEHOLDER);
  });

  it('spawn failure yields the placeholder', async () => {
    const exec = new FakeExec(new Error('spawn ENOENT'));
    expect(await versionFrom(exec)).toBe(VERSION_PLACEHOLDER);
  });
});
