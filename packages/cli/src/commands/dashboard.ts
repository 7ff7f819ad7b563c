/**
 * ddm-status dashboard — Full-screen status view
 *
 * Also what a bare `ddm-status` opens in an interactive terminal.
 */

import { Command } from 'commander';
import React from 'react';
import { render } from 'ink';
import { StatusView } from '../tui/dashboard/StatusView.js';
import { reportFailure, serviceFor, withCommonOptions } from './options.js';
import type { CommonOptions } from './options.js';

export async function launchDashboard(options: CommonOptions): Promise<void> {
  const service = serviceFor(options);
  const { waitUntilExit } = render(React.createElement(StatusView, { service }));
  await waitUntilExit();
}

export const dashboardCommand = withCommonOptions(
  new Command('dashboard').description('Open the full-screen status view (q to quit, r to refresh)'),
).action(async (options: CommonOptions) => {
  try {
    await launchDashboard(options);
  } catch (err: unknown) {
    reportFailure(err);
  }
});
