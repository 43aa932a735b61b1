/**
 * Crucible Runtime Host — Chroot Root Runner
 *
 * Implements RootRunner: runs a script inside a mounted container root with
 * `chroot <root> env -i VAR=… /bin/bash -x <script>`. The script sees only
 * the given variables.
 */

import type { ExecAdapter, RootRunner } from '@crucible/kernel';
import { runChecked } from '../adapters/exec.js';

export class ChrootRootRunner implements RootRunner {
  constructor(private readonly exec: ExecAdapter) {}

  async runScript(root: string, script: string, env: Readonly<Record<string, string>>): Promise<void> {
    await runChecked(this.exec, 'chroot', chrootArgs(root, script, env), { inherit: true });
  }
}

export function chrootArgs(root: string, script: string, env: Readonly<Record<string, string>>): string[] {
  const assignments = Object.entries(env).map(([name, value]) => `${name}=${value}`);
  return [root, 'env', '-i', ...assignments, '/bin/bash', '-x', script];
}
