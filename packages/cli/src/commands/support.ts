/**
 * ddm-status support — Show how to reach the support team
 */

import { Command } from 'commander';
import { renderSupportBlock } from '../tui/output/status.js';
import { reportFailure, serviceFor, withCommonOptions } from './options.js';
import type { CommonOptions } from './options.js';

export const supportCommand = withCommonOptions(
  new Command('support').description('Show the configured support contacts'),
).action(async (options: CommonOptions) => {
  try {
    const snapshot = await serviceFor(options).getStatus();
    process.stdout.write(
      '\n' + renderSupportBlock(snapshot.preferences.supportTeamName, snapshot.supportActions),
    );
  } catch (err: unknown) {
    reportFailure(err);
  }
});
