/**
 * Crucible Runtime Host — Subprocess Execution Adapter
 *
 * Implements the ExecAdapter interface from @crucible/kernel.
 * Uses node:child_process.spawn for all subprocess execution.
 *
 * Two modes:
 *   - captured (default): stdout and stderr are collected and returned
 *   - inherit: the child shares this process's stdio, so long builds
 *     stream their output and interactive shells work
 *
 * A nonzero exit is returned, not thrown. Tool adapters call runChecked()
 * to turn it into an ExternalToolError.
 */

import { spawn } from 'node:child_process';
import { ExternalToolError } from '@crucible/kernel';
import type { ExecAdapter, ExecOptions, ExecResult } from '@crucible/kernel';

// ---------------------------------------------------------------------------
// NodeExecAdapter
// ---------------------------------------------------------------------------

export class NodeExecAdapter implements ExecAdapter {
  /**
   * Spawn a subprocess and wait for it to exit.
   *
   * `options.env` is layered over this process's environment.
   *
   * @throws {Error} If the command cannot be started (e.g. ENOENT)
   */
  async run(
    command: string,
    args: ReadonlyArray<string>,
    options: ExecOptions = {},
  ): Promise<ExecResult> {
    const inherit = options.inherit === true;

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout?.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr?.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

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

// ---------------------------------------------------------------------------
// Checked execution
// ---------------------------------------------------------------------------

/**
 * Run a command and throw ExternalToolError unless it exits 0.
 */
export async function runChecked(
  exec: ExecAdapter,
  command: string,
  args: ReadonlyArray<string>,
  options?: ExecOptions,
): Promise<ExecResult> {
  let result: ExecResult;
  try {
    result = await exec.run(command, args, options);
  } catch (err: unknown) {
    throw new ExternalToolError(command, args, null, '', { cause: err });
  }
  if (result.exitCode !== 0) {
    throw new ExternalToolError(command, args, result.exitCode, result.stderr);
  }
  return result;
}
