/**
 * Crucible Kernel — Toolkit Stamp
 *
 * The toolkit directory records which build it belongs to in `job.json`.
 * A later run against the same output layout must describe the same
 * (vendor, release, source) or the driver refuses to touch it.
 *
 * The fingerprint is SHA-256 over the canonical JSON of the identity fields.
 */

import { createHash } from 'node:crypto';
import type { BuildJob } from '../types/job.js';

export const STAMP_FILE = 'job.json';

export interface ToolkitStamp {
  readonly vendor: string;
  readonly release: string;
  readonly sourceDir: string;
  readonly fingerprint: string;
}

export function jobFingerprint(job: Pick<BuildJob, 'vendor' | 'release' | 'sourceDir'>): string {
  const canonical = JSON.stringify([job.vendor, job.release, job.sourceDir]);
  return createHash('sha256').update(canonical, 'utf-8').digest('hex');
}

export function makeStamp(job: BuildJob): ToolkitStamp {
  return {
    vendor: job.vendor,
    release: job.release,
    sourceDir: job.sourceDir,
    fingerprint: jobFingerprint(job),
  };
}

/**
 * Parse a stamp file. Returns null for anything that is not a well-formed
 * stamp, so a damaged file is reported as a mismatch by the caller.
 */
export function parseStamp(text: string): ToolkitStamp | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null) return null;

  const vendor: unknown = Reflect.get(value, 'vendor');
  const release: unknown = Reflect.get(value, 'release');
  const sourceDir: unknown = Reflect.get(value, 'sourceDir');
  const fingerprint: unknown = Reflect.get(value, 'fingerprint');
  if (
    typeof vendor !== 'string' ||
    typeof release !== 'string' ||
    typeof sourceDir !== 'string' ||
    typeof fingerprint !== 'string'
  ) {
    return null;
  }
  return { vendor, release, sourceDir, fingerprint };
}
