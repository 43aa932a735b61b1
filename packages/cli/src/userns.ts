/**
 * Mounting a working container's root as an unprivileged user only works
 * inside the user namespace `buildah unshare` sets up. Commands that compose
 * images re-run the whole CLI invocation there.
 */

import type { ExecAdapter } from '@crucible/kernel';
import { needsUserNamespace, unshareArgs } from '@crucible/runtime-host';

export function mustReexec(): boolean {
  return needsUserNamespace(process.getuid?.() ?? 0, process.env);
}

/** @returns The exit status of the re-executed invocation */
export async function reexecUnderUnshare(exec: ExecAdapter, extraArgs: ReadonlyArray<string> = []): Promise<number> {
  const argv = [process.execPath, ...process.execArgv, ...process.argv.slice(1), ...extraArgs];
  const result = await exec.run('buildah', unshareArgs(argv), { inherit: true });
  return result.exitCode;
}
