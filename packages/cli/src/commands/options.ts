/**
 * Options shared by every command, and the one error path they all use.
 *
 * Source paths left unset fall through to their DDM_STATUS_* environment
 * variables and then to the system defaults (see runtime-host home.ts).
 */

import { Command } from 'commander';
import { createStatusService } from '../tui/services/index.js';
import type { IStatusService } from '../tui/services/index.js';
import { t } from '../tui/theme.js';

export interface CommonOptions {
  home?: string;
  installLog?: string;
  prefs?: string;
  logLevel?: string;
  demo?: boolean;
}

export function withCommonOptions(command: Command): Command {
  return command
    .option('--home <dir>', 'status home directory (default: $DDM_STATUS_HOME or ~/.ddm-status)')
    .option('--install-log <path>', 'install log to read enforcement entries from')
    .option('--prefs <path>', 'managed preference file (wins over the local one when present)')
    .option('--log-level <level>', 'diagnostic log level on stderr')
    .option('--demo', 'use built-in sample data instead of reading this machine');
}

export function serviceFor(opts: CommonOptions, refreshMinutes?: string): IStatusService {
  return createStatusService({
    demo: opts.demo,
    statusHome: opts.home,
    logLevel: opts.logLevel,
    refreshMinutes,
    sources: {
      installLog: opts.installLog,
      managedPreferences: opts.prefs,
    },
  });
}

/** Print a command failure on stderr and mark the process as failed. */
export function reportFailure(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(t.red('error: ') + message + '\n');
  process.exitCode = 1;
}
