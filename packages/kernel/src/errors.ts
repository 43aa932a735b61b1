/**
 * Crucible Kernel — Error Taxonomy
 *
 * Every failure the kernel raises is a CrucibleError with a `kind`
 * discriminant. The CLI maps any CrucibleError to exit status 1 and prints
 * its message; the kind is recorded in the event log.
 *
 * Parse leniency (absent sections, missing placeholders, malformed %attr
 * lines) never produces an error. Nothing here is retried.
 */

import type { BuildStage, CacheKey } from './types/stage.js';
import type { BuildStepId } from './types/job.js';

export type CrucibleErrorKind =
  | 'configuration'
  | 'external-tool'
  | 'stage'
  | 'compose'
  | 'lock';

export class CrucibleError extends Error {
  constructor(
    readonly kind: CrucibleErrorKind,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CrucibleError';
  }
}

/** A missing or unreadable directory, recipe file, or config file. */
export class ConfigurationError extends CrucibleError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

/** The recipe template is absent from the source tree. */
export class SpecNotFoundError extends ConfigurationError {
  constructor(readonly path: string) {
    super(`recipe file not found: ${path}`);
    this.name = 'SpecNotFoundError';
  }
}

/** Number of trailing stderr characters kept on an ExternalToolError. */
const STDERR_TAIL = 2000;

/**
 * A subprocess exited nonzero (or could not be started).
 *
 * `exitCode` is null when the process never ran.
 */
export class ExternalToolError extends CrucibleError {
  readonly stderrTail: string;

  constructor(
    readonly command: string,
    readonly args: ReadonlyArray<string>,
    readonly exitCode: number | null,
    stderr: string,
    options?: { readonly cause?: unknown },
  ) {
    const status = exitCode === null ? 'could not be started' : `exited with status ${exitCode}`;
    super('external-tool', `${command} ${status}`, options);
    this.name = 'ExternalToolError';
    this.stderrTail = stderr.length > STDERR_TAIL ? stderr.slice(-STDERR_TAIL) : stderr;
  }
}

/** Wraps the cause of a failed build step, naming the step. */
export class BuildStepError extends CrucibleError {
  constructor(readonly step: BuildStepId, cause: unknown) {
    super(
      cause instanceof CrucibleError ? cause.kind : 'external-tool',
      `build step '${step}' failed: ${messageOf(cause)}`,
      { cause },
    );
    this.name = 'BuildStepError';
  }
}

/** Wraps the cause of a failed stage image build. */
export class StageBuildError extends CrucibleError {
  constructor(readonly stage: BuildStage, readonly image: string, cause: unknown) {
    super('stage', `stage '${stage}' (${image}) failed: ${messageOf(cause)}`, { cause });
    this.name = 'StageBuildError';
  }
}

/**
 * A stage was asked to build while its predecessor's image is absent.
 */
export class StageOrderError extends CrucibleError {
  constructor(readonly stage: BuildStage, readonly missing: string) {
    super('stage', `cannot build stage '${stage}': upstream image ${missing} is not present`);
    this.name = 'StageOrderError';
  }
}

export type ComposePhase = 'from' | 'mount' | 'sync' | 'post-install' | 'commit' | 'tag';

/**
 * Composition failed. `containerId` is the working container left behind,
 * or null when it was never created.
 */
export class ComposeError extends CrucibleError {
  constructor(
    readonly phase: ComposePhase,
    readonly containerId: string | null,
    cause: unknown,
  ) {
    const where = containerId === null ? '' : ` (working container ${containerId})`;
    super('compose', `compose failed during '${phase}'${where}: ${messageOf(cause)}`, { cause });
    this.name = 'ComposeError';
  }
}

export class LockTimeoutError extends CrucibleError {
  constructor(readonly key: CacheKey, readonly waitedMs: number) {
    super('lock', `timed out after ${waitedMs}ms waiting for the lock on ${key.stage}/${key.vendor}/${key.release}`);
    this.name = 'LockTimeoutError';
  }
}

/** The message of an unknown thrown value. */
export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
