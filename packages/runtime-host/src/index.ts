/**
 * @crucible/runtime-host
 *
 * Side-effectful adapter implementations and state persistence. Depends on
 * @crucible/kernel (interfaces); implements them with Node.js built-ins and
 * the podman, buildah, rsync, git, rpmspec and ccache command line tools.
 *
 * No kernel code imports from this package.
 */

// Process and filesystem
export { NodeExecAdapter, runChecked } from './adapters/exec.js';
export { NodeWorkspaceFs, isNodeError } from './adapters/fs.js';

// Containers
export {
  PodmanContainerRunner,
  PodmanImageStore,
  normalizeRef,
  parseImageList,
  runArgs,
  splitRef,
} from './container/podman.js';
export {
  BuildahWorkingContainers,
  USERNS_MARKER,
  needsUserNamespace,
  unshareArgs,
} from './container/buildah.js';
export { ChrootRootRunner, chrootArgs } from './container/chroot.js';

// Tree sync
export { RSYNC_FLAGS, RsyncTreeSync } from './sync/rsync.js';
export { NodeTreeSync } from './sync/node-tree-sync.js';

// Sources
export { GitVersionControl } from './source/git.js';
export { RpmspecResolver, resolveArgs } from './source/rpmspec.js';

// Locks and compiler cache
export { FileStageLock, parseHolderPid, parseHolderToken } from './locks/stage-lock.js';
export type { FileStageLockOptions } from './locks/stage-lock.js';
export { DEFAULT_CCACHE_SIZE, ccacheDirFor, provisionCcache } from './ccache.js';

// Logging
export { EVENT_LOG, FileLogSink } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';

// State
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { BuildRecord } from './state/build-registry.js';
export { BUILDS_FILE, BuildRegistry } from './state/build-registry.js';

// Home and configuration
export type { ResolveCrucibleHomeOptions } from './home.js';
export {
  HOME_ENV,
  defaultConfigPath,
  getOsConfigPath,
  locksDir,
  readHomeFromConfig,
  resolveCrucibleHome,
  writeHomeToConfig,
} from './home.js';
export type { ConfigInput, CrucibleConfig, TreeSyncKind } from './config.js';
export {
  CONFIG_DEFAULTS,
  DEFAULT_RECIPES_DIR,
  imageNaming,
  isTreeSyncKind,
  loadConfig,
  parseConfig,
  writeConfig,
} from './config.js';
export type { BuildLayout } from './layout.js';
export { anonymousBuildName, buildLayout } from './layout.js';
