/**
 * Crucible Runtime Host — Build Directory Layout
 *
 *   <buildsDir>/<name>/
 *     install/   InstallTree (mounted at /build/out)
 *     toolkit/   synthesized scripts (mounted at /build/bin)
 *
 * Anonymous builds are named `<vendor>-<release>_<timestamp>`.
 */

import { join } from 'node:path';
import { timestampTag } from '@crucible/kernel';

export interface BuildLayout {
  readonly root: string;
  readonly install: string;
  readonly toolkit: string;
}

export function buildLayout(buildsDir: string, name: string): BuildLayout {
  const root = join(buildsDir, name);
  return { root, install: join(root, 'install'), toolkit: join(root, 'toolkit') };
}

export function anonymousBuildName(vendor: string, release: string, now: Date): string {
  return `${vendor}-${release}_${timestampTag(now)}`;
}
