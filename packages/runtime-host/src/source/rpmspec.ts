/**
 * Crucible Runtime Host — rpmspec Resolver
 *
 * Expands the macros of a working spec by running `rpmspec --parse` inside
 * the builder image, where the macro definitions of the target distribution
 * are installed. The spec's directory is mounted read-only.
 */

import { basename, dirname } from 'node:path';
import type { ExecAdapter, SpecResolver } from '@crucible/kernel';
import { runChecked } from '../adapters/exec.js';

const SPEC_MOUNT = '/build/spec';

export class RpmspecResolver implements SpecResolver {
  constructor(private readonly exec: ExecAdapter) {}

  async resolve(specFile: string, image: string): Promise<string> {
    const result = await runChecked(this.exec, 'podman', resolveArgs(specFile, image));
    return result.stdout;
  }
}

export function resolveArgs(specFile: string, image: string): string[] {
  return [
    'run',
    '--rm',
    '-v',
    `${dirname(specFile)}:${SPEC_MOUNT}:ro`,
    '--entrypoint',
    'rpmspec',
    image,
    '--parse',
    `${SPEC_MOUNT}/${basename(specFile)}`,
  ];
}
