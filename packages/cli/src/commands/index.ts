/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/ddm-status.ts.
 */

import { program } from 'commander';
import { statusCommand } from './status.js';
import { watchCommand } from './watch.js';
import { historyCommand } from './history.js';
import { supportCommand } from './support.js';
import { dashboardCommand } from './dashboard.js';

program
  .name('ddm-status')
  .description(
    'Shows whether device management is enforcing an OS update on this Mac,\n' +
    'the deadline and days remaining, and basic system health.',
  )
  .version('0.1.0');

program.addCommand(statusCommand);
program.addCommand(watchCommand);
program.addCommand(historyCommand);
program.addCommand(supportCommand);
program.addCommand(dashboardCommand);

export { program };
