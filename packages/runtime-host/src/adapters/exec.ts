/**
 * DDM Status Runtime Host — Subprocess Execution Adapter
 *
 * Uses node:child_process.spawn (no shell) for the few system queries the
 * host makes. Collectors depend on the ExecAdapter interface so tests can
 * substitute a fake without spawning anything.
 */

import { spawn } from 'node:child_process';

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ExecOptions {
  readonly cwd?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Kill the child after this many milliseconds. */
  readonly timeoutMs?: number | undefined;
}

export interface ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options?: ExecOptions): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// NodeExecAdapter
// ---------------------------------------------------------------------------

/**
 * Spawns a subprocess and collects its stdout/stderr.
 *
 * Resolves with the exit code (a child killed by a signal or timeout reports
 * exit code 1). Rejects only when the process cannot be spawned at all,
 * e.g. ENOENT for a missing executable.
 */
export class NodeExecAdapter implements ExecAdapter {
  async run(
    command: string,
    args: ReadonlyArray<string>,
    options: ExecOptions = {},
  ): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

      child.on('close', (exitCode: number | null) => {
        resolve({
          exitCode: exitCode ?? 1,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        });
      });

      child.on('error', (err: Error) => { reject(err); });
    });
  }
}
