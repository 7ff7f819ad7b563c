/**
 * DDM Status Runtime Host — StateIO
 *
 * An injectable I/O abstraction over the append-only logs kept under the
 * status home. The history sink and the history reader only ever see a
 * StateIO, never a path, so tests run them against MemoryStateIO.
 *
 * Invariants:
 * - Log filenames are relative; they resolve under `<home>/logs/`
 * - appendLine writes exactly `line + '\n'`
 * - readLogRaw returns '' for a log that does not exist yet
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '../collectors/files.js';

export interface StateIO {
  /**
   * Append one line to a log file, creating the logs directory on demand.
   *
   * @param logfilename - Filename within the logs subdirectory (e.g. 'status.jsonl')
   * @param line - Line content without trailing newline
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw log content, or '' if the log does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable StateIO under a status home directory.
 *
 * Synchronous: an appended line is on disk before the call returns.
 * ENOENT on read is the empty log; any other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }

  /** Appended lines, in order. Test helper; not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  /** Replace a log's raw content wholesale. Test helper for corrupt-log cases. */
  writeLogRaw(logfilename: string, content: string): void {
    const lines = content.endsWith('\n') ? content.slice(0, -1) : content;
    this.logs.set(logfilename, lines === '' ? [] : lines.split('\n'));
  }
}
