/**
 * Crucible Kernel — Adapter Interfaces
 *
 * Every side effect of the build pipeline flows through one of these
 * interfaces: the container runtime, the tree synchronizer, version control,
 * the spec macro processor, the host filesystem and advisory locks.
 *
 * No implementations are provided here. Concrete adapters live in
 * @crucible/runtime-host and are injected at construction time; tests inject
 * in-process fakes.
 *
 * Adapters report a failed subprocess by throwing ExternalToolError.
 */

import type { CacheKey, ImageRef } from '../types/stage.js';

// ---------------------------------------------------------------------------
// Subprocess execution
// ---------------------------------------------------------------------------

export interface ExecOptions {
  readonly cwd?: string | undefined;
  readonly env?: Readonly<Record<string, string>> | undefined;
  /**
   * Attach the child to this process's stdio instead of capturing output.
   * Used for long builds and interactive shells; stdout and stderr are
   * returned empty.
   */
  readonly inherit?: boolean | undefined;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs a subprocess to completion. A nonzero exit is reported in the
 * result, not thrown; the tool adapters decide what is a failure.
 */
export interface ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options?: ExecOptions): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// Image store (podman build / images / rmi)
// ---------------------------------------------------------------------------

export interface ImageBuildRequest {
  readonly image: ImageRef;
  /** Recipe file name, relative to the recipes directory. */
  readonly recipe: string;
  readonly buildArgs: Readonly<Record<string, string>>;
}

export interface ImageSummary {
  /** Content id; several references may share one. */
  readonly id: string;
  /** `repository:tag` with any registry prefix normalized away. */
  readonly ref: ImageRef;
  readonly repository: string;
  readonly tag: string;
  readonly createdAt: string;
}

export interface ImageStore {
  /** True iff an image with exactly this `repository:tag` exists. */
  exists(ref: ImageRef): Promise<boolean>;
  build(request: ImageBuildRequest): Promise<void>;
  /** Every tagged image under a repository. */
  list(repository: string): Promise<ReadonlyArray<ImageSummary>>;
  remove(ref: ImageRef): Promise<void>;
}

// ---------------------------------------------------------------------------
// Disposable containers (podman run --rm)
// ---------------------------------------------------------------------------

export interface BindMount {
  readonly host: string;
  readonly container: string;
}

export interface ContainerRunRequest {
  readonly image: ImageRef;
  readonly mounts: ReadonlyArray<BindMount>;
  readonly env: Readonly<Record<string, string>>;
  /** Script path inside the container, run with bash. */
  readonly script: string;
}

export interface ContainerRunner {
  run(request: ContainerRunRequest): Promise<void>;
}

// ---------------------------------------------------------------------------
// Working containers (buildah from / mount / commit)
// ---------------------------------------------------------------------------

export interface WorkingContainers {
  /** Create a working container; returns its id. */
  from(image: ImageRef): Promise<string>;
  /** Mount the container's root; returns the host mount point. */
  mount(containerId: string): Promise<string>;
  unmount(containerId: string): Promise<void>;
  commit(containerId: string, image: ImageRef): Promise<void>;
  tag(image: ImageRef, alias: ImageRef): Promise<void>;
  remove(containerId: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Tree sync and chroot
// ---------------------------------------------------------------------------

/**
 * Non-destructive merge of one tree into another.
 *
 * Files present only in the target are preserved. Files present in both
 * are overwritten by the source. Permissions, ownership, symlinks and
 * modification times are preserved.
 */
export interface TreeSync {
  sync(sourceDir: string, targetDir: string): Promise<void>;
}

export interface RootRunner {
  /**
   * Run a bash script inside a mounted root filesystem.
   *
   * @param root - Host path of the mounted root
   * @param script - Script path relative to the root, e.g. `/post-install.sh`
   */
  runScript(root: string, script: string, env: Readonly<Record<string, string>>): Promise<void>;
}

// ---------------------------------------------------------------------------
// Source tree
// ---------------------------------------------------------------------------

export interface VersionControl {
  /** Raw `git describe --long --match 'v*'` output. */
  describe(sourceDir: string): Promise<string>;
  /** Sync and update submodules recursively. */
  prepareSubmodules(sourceDir: string): Promise<void>;
  clone(url: string, targetDir: string, branch?: string): Promise<void>;
}

export interface SpecResolver {
  /**
   * Expand the macros of a working spec with the spec processor inside
   * the given image. Returns the resolved document.
   *
   * @param specFile - Host path of the working spec
   */
  resolve(specFile: string, image: ImageRef): Promise<string>;
}

// ---------------------------------------------------------------------------
// Host filesystem
// ---------------------------------------------------------------------------

export type PathKind = 'file' | 'directory' | 'missing' | 'other';

export interface WorkspaceFs {
  kind(path: string): Promise<PathKind>;
  readText(path: string): Promise<string>;
  /** Write a file, creating parent directories. */
  writeText(path: string, content: string, mode?: number): Promise<void>;
  ensureDir(path: string): Promise<void>;
  /** Remove a file or directory tree; a missing path is not an error. */
  remove(path: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Advisory locks
// ---------------------------------------------------------------------------

export interface LockHandle {
  release(): Promise<void>;
}

/**
 * Serializes the check-then-build of one CacheKey across processes.
 */
export interface StageLock {
  acquire(key: CacheKey): Promise<LockHandle>;
}
