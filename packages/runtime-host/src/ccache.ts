/**
 * Crucible Runtime Host — Compiler Cache Provisioning
 *
 * Each (vendor, release) gets its own ccache directory under the configured
 * cache root, created on demand and capped with `ccache -M <size>`.
 *
 * Concurrent builds of the same (vendor, release) share the directory
 * without locking; ccache tolerates concurrent writers.
 */

import { join } from 'node:path';
import { assertImageComponent } from '@crucible/kernel';
import type { ExecAdapter, WorkspaceFs } from '@crucible/kernel';
import { runChecked } from './adapters/exec.js';

export const DEFAULT_CCACHE_SIZE = '10G';

export function ccacheDirFor(ccacheRoot: string, vendor: string, release: string): string {
  assertImageComponent('vendor', vendor);
  assertImageComponent('release', release);
  return join(ccacheRoot, vendor, release);
}

/**
 * Create the per-release cache directory and set its size limit.
 *
 * @returns The cache directory to bind at /build/ccache
 */
export async function provisionCcache(
  exec: ExecAdapter,
  fs: WorkspaceFs,
  ccacheRoot: string,
  vendor: string,
  release: string,
  size: string = DEFAULT_CCACHE_SIZE,
): Promise<string> {
  const dir = ccacheDirFor(ccacheRoot, vendor, release);
  await fs.ensureDir(dir);
  await runChecked(exec, 'ccache', ['-M', size], { env: { CCACHE_DIR: dir } });
  return dir;
}
