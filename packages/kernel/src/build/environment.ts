/**
 * Crucible Kernel — Build Container Environment
 *
 * Bind mounts and environment variables shared by every container step of
 * a build.
 */

import type { BindMount } from '../adapters/index.js';
import { CONTAINER_PATHS, type BuildJob } from '../types/job.js';

export function buildMounts(job: BuildJob): BindMount[] {
  const mounts: BindMount[] = [
    { host: job.sourceDir, container: CONTAINER_PATHS.source },
    { host: job.outputDir, container: CONTAINER_PATHS.output },
    { host: job.toolkitDir, container: CONTAINER_PATHS.toolkit },
  ];
  if (job.cacheDir !== null) {
    mounts.push({ host: job.cacheDir, container: CONTAINER_PATHS.ccache });
  }
  return mounts;
}

/**
 * `CEPH_EXTRA_CMAKE_ARGS` disables test compilation unless tests were
 * requested, and enables the compiler cache when a cache dir is bound.
 */
export function buildEnvironment(job: BuildJob): Record<string, string> {
  const cmakeArgs: string[] = [];
  if (!job.withTests) {
    cmakeArgs.push('-DWITH_TESTS=OFF');
  }
  if (job.cacheDir !== null) {
    cmakeArgs.push('-DWITH_CCACHE=ON');
  }

  const env: Record<string, string> = {
    CEPH_EXTRA_CMAKE_ARGS: cmakeArgs.join(' '),
  };
  if (job.cacheDir !== null) {
    env['CCACHE_DIR'] = CONTAINER_PATHS.ccache;
    env['CCACHE_BASEDIR'] = CONTAINER_PATHS.source;
  }
  return env;
}
