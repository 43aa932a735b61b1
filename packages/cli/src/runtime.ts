/**
 * Runtime wiring: resolves the home directory and configuration, then
 * assembles the kernel services over the runtime-host adapters.
 *
 * Every command calls loadRuntime() once; nothing here is cached across
 * invocations.
 */

import {
  BuildDriver,
  BuildLogger,
  ImageComposer,
  StageCache,
  teeSinks,
  type ImageNaming,
  type TreeSync,
} from '@crucible/kernel';
import {
  BuildRegistry,
  BuildahWorkingContainers,
  ChrootRootRunner,
  FileLogSink,
  FileStageLock,
  FileStateIO,
  GitVersionControl,
  NodeExecAdapter,
  NodeTreeSync,
  NodeWorkspaceFs,
  PodmanContainerRunner,
  PodmanImageStore,
  RpmspecResolver,
  RsyncTreeSync,
  defaultConfigPath,
  imageNaming,
  loadConfig,
  locksDir,
  resolveCrucibleHome,
  type CrucibleConfig,
} from '@crucible/runtime-host';
import { ConsoleReporter } from './output/reporter.js';

/** Options every command accepts. */
export interface RuntimeOptions {
  readonly home?: string | undefined;
  readonly config?: string | undefined;
}

export interface Runtime {
  readonly home: string;
  readonly configPath: string;
  readonly config: CrucibleConfig;
  readonly naming: ImageNaming;
  readonly exec: NodeExecAdapter;
  readonly fs: NodeWorkspaceFs;
  readonly store: PodmanImageStore;
  readonly runner: PodmanContainerRunner;
  readonly vcs: GitVersionControl;
  readonly registry: BuildRegistry;
  readonly logger: BuildLogger;
}

export function resolveConfigPath(options: RuntimeOptions): { home: string; configPath: string } {
  const home = resolveCrucibleHome({ home: options.home });
  return { home, configPath: options.config ?? defaultConfigPath(home) };
}

/**
 * @throws {ConfigurationError} If the config file is missing or invalid
 */
export function loadRuntime(options: RuntimeOptions): Runtime {
  const { home, configPath } = resolveConfigPath(options);
  const config = loadConfig(configPath);
  const stateIO = new FileStateIO(home);
  const exec = new NodeExecAdapter();

  return {
    home,
    configPath,
    config,
    naming: imageNaming(config),
    exec,
    fs: new NodeWorkspaceFs(),
    store: new PodmanImageStore(exec, config.recipesDir),
    runner: new PodmanContainerRunner(exec),
    vcs: new GitVersionControl(exec),
    registry: new BuildRegistry(stateIO),
    logger: new BuildLogger(teeSinks(new FileLogSink(stateIO), new ConsoleReporter())),
  };
}

export function stageCache(rt: Runtime): StageCache {
  return new StageCache({
    store: rt.store,
    naming: rt.naming,
    lock: new FileStageLock(locksDir(rt.home)),
    logger: rt.logger,
  });
}

export function buildDriver(rt: Runtime): BuildDriver {
  return new BuildDriver({
    fs: rt.fs,
    store: rt.store,
    vcs: rt.vcs,
    resolver: new RpmspecResolver(rt.exec),
    runner: rt.runner,
    naming: rt.naming,
    projectName: rt.config.projectName,
    recipeFile: rt.config.recipeFile,
    logger: rt.logger,
  });
}

export function imageComposer(rt: Runtime): ImageComposer {
  const sync: TreeSync = rt.config.treeSync === 'node' ? new NodeTreeSync() : new RsyncTreeSync(rt.exec);
  return new ImageComposer({
    containers: new BuildahWorkingContainers(rt.exec),
    sync,
    root: new ChrootRootRunner(rt.exec),
    fs: rt.fs,
    naming: rt.naming,
    logger: rt.logger,
  });
}
