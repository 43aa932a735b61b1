/**
 * @crucible/kernel
 *
 * Crucible build kernel: stage cache, build driver, image composer, build
 * event logger, error taxonomy and adapter interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process or node:net. node:crypto is used for the toolkit
 * stamp fingerprint (pure computation, not I/O).
 *
 * Concrete adapter implementations live in @crucible/runtime-host.
 */

// Types
export {
  ANY,
  BuildStage,
  CACHED_STAGES,
} from './types/stage.js';
export type {
  CacheKey,
  ImageNaming,
  ImageRef,
  StageOutcome,
  StageOutcomeStatus,
  StagePlan,
} from './types/stage.js';

export {
  BUILD_STEPS,
  BUILD_SUBDIR,
  CONTAINER_PATHS,
  POST_INSTALL_SCRIPT,
} from './types/job.js';
export type {
  BuildJob,
  BuildResult,
  BuildStepId,
  ComposeRequest,
  ComposeResult,
  ToolkitScripts,
} from './types/job.js';

// Adapter interfaces (implementations live in runtime-host)
export type {
  BindMount,
  ContainerRunner,
  ContainerRunRequest,
  ExecAdapter,
  ExecOptions,
  ExecResult,
  ImageBuildRequest,
  ImageStore,
  ImageSummary,
  LockHandle,
  PathKind,
  RootRunner,
  SpecResolver,
  StageLock,
  TreeSync,
  VersionControl,
  WorkingContainers,
  WorkspaceFs,
} from './adapters/index.js';

// Errors
export {
  BuildStepError,
  ComposeError,
  ConfigurationError,
  CrucibleError,
  ExternalToolError,
  LockTimeoutError,
  SpecNotFoundError,
  StageBuildError,
  StageOrderError,
  messageOf,
} from './errors.js';
export type { ComposePhase, CrucibleErrorKind } from './errors.js';

// Logging
export type { BuildEvent, BuildEventKind, LogSink } from './logging/log-sink.js';
export { teeSinks } from './logging/log-sink.js';
export { BuildLogger } from './logging/build-log.js';
export type { BuildEventInput } from './logging/build-log.js';

// Stages
export {
  LATEST_TAG,
  STAGE_RECIPES,
  assertImageComponent,
  builderImage,
  cacheKey,
  cacheKeyId,
  finalRepository,
  latestImage,
  releaseBaseImage,
  seedImage,
  stagePlan,
  timestampTag,
} from './stages/plan.js';
export { StageCache } from './stages/cache.js';
export type { EnsureOptions, StageCacheDeps } from './stages/cache.js';
export { resolveComposeBase } from './stages/compose-base.js';
export type { ComposeBase, ComposeBaseRequest } from './stages/compose-base.js';

// Build
export { BuildDriver } from './build/driver.js';
export type { BuildDriverDeps } from './build/driver.js';
export { buildEnvironment, buildMounts } from './build/environment.js';
export { STAMP_FILE, jobFingerprint, makeStamp, parseStamp } from './build/stamp.js';
export type { ToolkitStamp } from './build/stamp.js';

// Compose
export { ImageComposer, POST_INSTALL_PATH } from './compose/composer.js';
export type { ImageComposerDeps } from './compose/composer.js';
