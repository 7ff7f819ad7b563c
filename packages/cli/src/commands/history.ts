/**
 * ddm-status history — Show recorded refreshes
 *
 * Reads <home>/logs/status.jsonl. Damaged lines and duplicates are skipped.
 */

import { Command, InvalidArgumentError } from 'commander';
import { renderHistory } from '../tui/output/history.js';
import { reportFailure, serviceFor, withCommonOptions } from './options.js';
import type { CommonOptions } from './options.js';

export function parseLimit(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n === 0) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return n;
}

export const historyCommand = withCommonOptions(
  new Command('history')
    .description('Show recent status refreshes, oldest first')
    .option('--limit <n>', 'number of entries to show', parseLimit, 20),
).action(async (options: CommonOptions & { limit: number }) => {
  try {
    const entries = await serviceFor(options).getHistory(options.limit);
    process.stdout.write(renderHistory(entries));
  } catch (err: unknown) {
    reportFailure(err);
  }
});
