/**
 * DDM Status Runtime Host — Installed OS Version
 *
 * Queries `sw_vers -productVersion`. Any failure (missing executable,
 * non-zero exit, empty output) yields the placeholder, which the evaluator
 * compares as an all-zero version.
 */

import type { Logger } from 'pino';
import type { ExecAdapter } from '../adapters/exec.js';

export const VERSION_PLACEHOLDER = '–';

export interface OsVersionSource {
  readonly exec: ExecAdapter;
  readonly command: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
}

export async function readInstalledVersion(source: OsVersionSource): Promise<string> {
  const { exec, command, timeoutMs, logger } = source;
  try {
    const result = await exec.run(command, ['-productVersion'], { timeoutMs });
    const version = result.stdout.trim();
    if (result.exitCode !== 0 || version === '') {
      logger.warn(
        { command, exitCode: result.exitCode, stderr: result.stderr.trim() },
        'OS version query returned no version',
      );
      return VERSION_PLACEHOLDER;
    }
    return version;
  } catch (err: unknown) {
    logger.warn({ command, err }, 'OS version query failed');
    return VERSION_PLACEHOLDER;
  }
}
