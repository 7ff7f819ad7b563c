/**
 * ddm-status status — Show the current enforcement and system status
 *
 * Collects one snapshot and prints it. With --json the document is the
 * only thing written to stdout; diagnostics stay on stderr.
 */

import { Command } from 'commander';
import { renderStatus, statusJson } from '../tui/output/status.js';
import { reportFailure, serviceFor, withCommonOptions } from './options.js';
import type { CommonOptions } from './options.js';

export const statusCommand = withCommonOptions(
  new Command('status')
    .description('Show whether an enforced OS update is pending, its deadline, and system health')
    .option('--json', 'Output as JSON'),
).action(async (options: CommonOptions & { json?: boolean }) => {
  try {
    const snapshot = await serviceFor(options).getStatus();
    if (options.json === true) {
      process.stdout.write(JSON.stringify(statusJson(snapshot), null, 2) + '\n');
      return;
    }
    process.stdout.write(renderStatus(snapshot));
  } catch (err: unknown) {
    reportFailure(err);
  }
});
