/**
 * DDM Status Runtime Host — Diagnostic Logger
 *
 * Collectors and the refresh loop report degraded readings (unreadable log,
 * failed version query) here. Diagnostics go to stderr so that stdout stays
 * reserved for command output such as `status --json`.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config.js';

export type { Logger } from 'pino';

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'ddm-status', level }, pino.destination(2));
}

/** A logger that discards everything. For tests and embedded use. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
