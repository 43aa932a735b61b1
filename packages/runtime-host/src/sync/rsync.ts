/**
 * Crucible Runtime Host — rsync Tree Sync
 *
 * Merges the top-level entries of the source tree into the target with
 *
 *   rsync --recursive --links --perms --group --owner --times <entries…> <target>/
 *
 * Files only in the target are kept; files in both are overwritten by the
 * source regardless of modification time. The target directory's own
 * attributes are left as they are.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecAdapter, TreeSync } from '@crucible/kernel';
import { runChecked } from '../adapters/exec.js';

export const RSYNC_FLAGS: ReadonlyArray<string> = [
  '--recursive',
  '--links',
  '--perms',
  '--group',
  '--owner',
  '--times',
];

export class RsyncTreeSync implements TreeSync {
  constructor(private readonly exec: ExecAdapter) {}

  async sync(sourceDir: string, targetDir: string): Promise<void> {
    const entries = (await readdir(sourceDir)).sort();
    if (entries.length === 0) return;

    const target = targetDir.endsWith('/') ? targetDir : `${targetDir}/`;
    await runChecked(this.exec, 'rsync', [
      ...RSYNC_FLAGS,
      ...entries.map((entry) => join(sourceDir, entry)),
      target,
    ]);
  }
}
