/**
 * Crucible Runtime Host — In-process Tree Sync
 *
 * A TreeSync with the same merge rules as RsyncTreeSync, for hosts without
 * rsync:
 *
 *   - directories are created as needed and merged recursively
 *   - regular files and symlinks in the source replace whatever the target
 *     holds at that path
 *   - entries present only in the target are kept
 *   - mode and modification times are copied; ownership is copied when
 *     running as root
 *
 * Directory times are set after their contents, so copying a child does not
 * disturb them. The target directory's own attributes are left as they are.
 */

import {
  chmod,
  copyFile,
  lchown,
  lstat,
  lutimes,
  mkdir,
  readdir,
  readlink,
  rm,
  symlink,
  utimes,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join } from 'node:path';
import type { TreeSync } from '@crucible/kernel';
import { isNodeError } from '../adapters/fs.js';

export class NodeTreeSync implements TreeSync {
  private readonly preserveOwner: boolean;

  /**
   * @param preserveOwner - Copy uid/gid; defaults to true when running as root
   */
  constructor(preserveOwner?: boolean) {
    this.preserveOwner = preserveOwner ?? process.getuid?.() === 0;
  }

  async sync(sourceDir: string, targetDir: string): Promise<void> {
    await mkdir(targetDir, { recursive: true });
    await this.mergeChildren(sourceDir, targetDir);
  }

  private async mergeChildren(sourceDir: string, targetDir: string): Promise<void> {
    const entries = (await readdir(sourceDir)).sort();
    for (const entry of entries) {
      await this.mergeEntry(join(sourceDir, entry), join(targetDir, entry));
    }
  }

  private async mergeEntry(source: string, target: string): Promise<void> {
    const stats = await lstat(source);
    const existing = await lstatOrNull(target);

    if (stats.isDirectory()) {
      if (existing !== null && !existing.isDirectory()) {
        await rm(target, { recursive: true, force: true });
      }
      await mkdir(target, { recursive: true });
      await this.mergeChildren(source, target);
      await chmod(target, stats.mode & 0o7777);
      await this.copyOwner(target, stats);
      await utimes(target, stats.atime, stats.mtime);
      return;
    }

    // Replace rather than write through: the old entry may be read-only.
    if (existing !== null) {
      await rm(target, { recursive: true, force: true });
    }

    if (stats.isSymbolicLink()) {
      await symlink(await readlink(source), target);
      await this.copyOwner(target, stats);
      await lutimes(target, stats.atime, stats.mtime);
      return;
    }

    if (stats.isFile()) {
      await copyFile(source, target);
      await chmod(target, stats.mode & 0o7777);
      await this.copyOwner(target, stats);
      await utimes(target, stats.atime, stats.mtime);
      return;
    }

    throw new Error(`cannot sync special file: ${source}`);
  }

  private async copyOwner(target: string, stats: Stats): Promise<void> {
    if (this.preserveOwner) {
      await lchown(target, stats.uid, stats.gid);
    }
  }
}

async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }
}
