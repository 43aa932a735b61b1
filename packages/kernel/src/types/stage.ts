/**
 * Crucible Kernel — Stage Types
 *
 * The image chain is strictly linear:
 *
 *   bootstrap → release-base → build-environment → (compiled output) → final
 *
 * Every stage image is a memoized artifact addressed by a CacheKey. The
 * orchestrator only checks an image's existence and identity; it never
 * inspects contents.
 */

// ---------------------------------------------------------------------------
// Build Stage
// ---------------------------------------------------------------------------

export enum BuildStage {
  /** Minimal seed image; shared by every vendor and release. */
  Bootstrap = 'bootstrap',
  /** Runtime dependencies for one (vendor, release). */
  ReleaseBase = 'release-base',
  /** Build toolchain on top of the release base. */
  BuildEnvironment = 'build-environment',
  /** Composed runtime image carrying the installed artifacts. */
  Final = 'final',
}

/** Stages the StageCache memoizes, in build order. */
export const CACHED_STAGES: ReadonlyArray<BuildStage> = [
  BuildStage.Bootstrap,
  BuildStage.ReleaseBase,
  BuildStage.BuildEnvironment,
];

/** Wildcard component of the bootstrap CacheKey. */
export const ANY = '*';

/**
 * Identifies one stage artifact. Bootstrap always has the constant key
 * `(bootstrap, *, *)`.
 */
export interface CacheKey {
  readonly stage: BuildStage;
  readonly vendor: string;
  readonly release: string;
}

/** Opaque `repository:tag` image reference. */
export type ImageRef = string;

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

/**
 * Naming inputs for every image the system produces.
 *
 *   bootstrap          <namespace>/seed:<seedTag>
 *   release-base       <namespace>/base/<vendor>:<release>
 *   build-environment  <namespace>/builder/<vendor>:<release>
 *   final              <namespace>-builds/<name>:<timestamp>
 */
export interface ImageNaming {
  readonly namespace: string;
  readonly seedTag: string;
}

// ---------------------------------------------------------------------------
// Stage Plan and Outcome
// ---------------------------------------------------------------------------

/** One step of the chain StageCache walks. */
export interface StagePlan {
  readonly stage: BuildStage;
  readonly key: CacheKey;
  readonly image: ImageRef;
  /** Recipe file name, relative to the recipes directory. */
  readonly recipe: string;
  readonly buildArgs: Readonly<Record<string, string>>;
}

export type StageOutcomeStatus = 'skipped' | 'built';

export interface StageOutcome {
  readonly stage: BuildStage;
  readonly image: ImageRef;
  readonly status: StageOutcomeStatus;
}
