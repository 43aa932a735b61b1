/**
 * Crucible Runtime Host — Buildah Working Containers
 *
 * Implements WorkingContainers with `buildah from | mount | umount |
 * commit | tag | rm`. Mounting a container root as an unprivileged user
 * requires running inside `buildah unshare`; see needsUserNamespace().
 */

import type { ExecAdapter, WorkingContainers } from '@crucible/kernel';
import { runChecked } from '../adapters/exec.js';

const BUILDAH = 'buildah';

export class BuildahWorkingContainers implements WorkingContainers {
  constructor(private readonly exec: ExecAdapter) {}

  async from(image: string): Promise<string> {
    return this.output(['from', image]);
  }

  async mount(containerId: string): Promise<string> {
    return this.output(['mount', containerId]);
  }

  async unmount(containerId: string): Promise<void> {
    await runChecked(this.exec, BUILDAH, ['umount', containerId]);
  }

  async commit(containerId: string, image: string): Promise<void> {
    await runChecked(this.exec, BUILDAH, ['commit', containerId, image]);
  }

  async tag(image: string, alias: string): Promise<void> {
    await runChecked(this.exec, BUILDAH, ['tag', image, alias]);
  }

  async remove(containerId: string): Promise<void> {
    await runChecked(this.exec, BUILDAH, ['rm', containerId]);
  }

  private async output(args: ReadonlyArray<string>): Promise<string> {
    const result = await runChecked(this.exec, BUILDAH, args);
    const value = result.stdout.trim().split('\n').at(-1)?.trim() ?? '';
    if (value === '') {
      throw new Error(`buildah ${args.join(' ')} printed nothing`);
    }
    return value;
  }
}

// ---------------------------------------------------------------------------
// User namespace
// ---------------------------------------------------------------------------

/** Set by `buildah unshare` in the re-executed child. */
export const USERNS_MARKER = '_CONTAINERS_USERNS_CONFIGURED';

/**
 * True when this process must re-execute itself under `buildah unshare`
 * to mount container roots: not root and not already inside a user
 * namespace set up by buildah.
 */
export function needsUserNamespace(
  uid: number,
  env: Readonly<Record<string, string | undefined>>,
): boolean {
  return uid !== 0 && (env[USERNS_MARKER] ?? '') === '';
}

/** argv for re-running `argv` inside `buildah unshare`. */
export function unshareArgs(argv: ReadonlyArray<string>): string[] {
  return ['unshare', ...argv];
}
