/**
 * Crucible Runtime Host — Git Version Control
 *
 * Implements VersionControl with the git CLI. The source tree is always
 * addressed with `-C <dir>` rather than by changing the working directory.
 */

import type { ExecAdapter, VersionControl } from '@crucible/kernel';
import { runChecked } from '../adapters/exec.js';

const GIT = 'git';

export class GitVersionControl implements VersionControl {
  constructor(private readonly exec: ExecAdapter) {}

  async describe(sourceDir: string): Promise<string> {
    const result = await runChecked(this.exec, GIT, ['-C', sourceDir, 'describe', '--long', '--match', 'v*']);
    return result.stdout;
  }

  async prepareSubmodules(sourceDir: string): Promise<void> {
    await runChecked(this.exec, GIT, ['-C', sourceDir, 'submodule', 'sync', '--recursive']);
    await runChecked(this.exec, GIT, ['-C', sourceDir, 'submodule', 'update', '--init', '--recursive'], {
      inherit: true,
    });
  }

  async clone(url: string, targetDir: string, branch?: string): Promise<void> {
    const args = ['clone'];
    if (branch !== undefined) {
      args.push('--branch', branch);
    }
    args.push('--recurse-submodules', url, targetDir);
    await runChecked(this.exec, GIT, args, { inherit: true });
  }
}
