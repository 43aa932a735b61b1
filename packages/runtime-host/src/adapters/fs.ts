/**
 * Crucible Runtime Host — Workspace Filesystem Adapter
 *
 * Implements the WorkspaceFs interface from @crucible/kernel.
 * Uses node:fs/promises for all I/O.
 *
 * The kernel defines the interface; this package owns the implementation.
 * Kernel code never imports node:fs directly.
 */

import { chmod, lstat, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { PathKind, WorkspaceFs } from '@crucible/kernel';

// ---------------------------------------------------------------------------
// Path safety
// ---------------------------------------------------------------------------

/** Null bytes are never valid in a path. */
function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`Invalid path: null byte detected in path: ${JSON.stringify(path)}`);
  }
}

// ---------------------------------------------------------------------------
// NodeWorkspaceFs
// ---------------------------------------------------------------------------

export class NodeWorkspaceFs implements WorkspaceFs {
  /** Symlinks are reported as 'other'; they are never followed. */
  async kind(path: string): Promise<PathKind> {
    assertSafePath(path);
    try {
      const stats = await lstat(path);
      if (stats.isFile()) return 'file';
      if (stats.isDirectory()) return 'directory';
      return 'other';
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) {
        return 'missing';
      }
      throw err;
    }
  }

  async readText(path: string): Promise<string> {
    assertSafePath(path);
    return readFile(path, 'utf-8');
  }

  /**
   * Write a file, creating parent directories as needed. The mode is applied
   * explicitly so the process umask does not narrow it.
   */
  async writeText(path: string, content: string, mode?: number): Promise<void> {
    assertSafePath(path);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
    if (mode !== undefined) {
      await chmod(path, mode);
    }
  }

  async ensureDir(path: string): Promise<void> {
    assertSafePath(path);
    await mkdir(path, { recursive: true });
  }

  async remove(path: string): Promise<void> {
    assertSafePath(path);
    await rm(path, { recursive: true, force: true });
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
