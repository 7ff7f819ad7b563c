/**
 * ddm-status watch — Refresh on an interval, one summary line per refresh
 *
 * Runs until interrupted. Failed refreshes are reported and the loop keeps
 * going.
 */

import { Command } from 'commander';
import { renderStatusLine } from '../tui/output/status.js';
import { reportFailure, serviceFor, withCommonOptions } from './options.js';
import type { CommonOptions } from './options.js';
import { t } from '../tui/theme.js';

export const watchCommand = withCommonOptions(
  new Command('watch')
    .description('Refresh the status on an interval and print a line per refresh')
    .option('--interval <minutes>', 'refresh interval (default: $DDM_STATUS_REFRESH_MINUTES or 60)'),
).action((options: CommonOptions & { interval?: string }) => {
  try {
    const service = serviceFor(options, options.interval);
    const stop = service.watch(
      ({ snapshot }) => { process.stdout.write(renderStatusLine(snapshot) + '\n'); },
      (err) => {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(t.red('refresh failed: ') + message + '\n');
      },
    );
    process.once('SIGINT', () => { stop(); });
    process.once('SIGTERM', () => { stop(); });
  } catch (err: unknown) {
    reportFailure(err);
  }
});
