/**
 * Crucible Kernel — Build Job Types
 *
 * A BuildJob is created per invocation, consumed once by the BuildDriver,
 * and never persisted. Named builds are persisted separately as
 * BuildRecords by the runtime host.
 */

import type { MalformedAttr, VersionDescriptor } from '@crucible/specfile';
import type { ImageRef } from './stage.js';

// ---------------------------------------------------------------------------
// Container layout
// ---------------------------------------------------------------------------

/** Fixed bind-mount targets inside the build container. */
export const CONTAINER_PATHS = {
  source: '/build/src',
  output: '/build/out',
  ccache: '/build/ccache',
  toolkit: '/build/bin',
} as const;

/** Out-of-tree build directory, relative to the source root. */
export const BUILD_SUBDIR = 'build';

/** Post-install script name, at the root of the install tree. */
export const POST_INSTALL_SCRIPT = 'post-install.sh';

// ---------------------------------------------------------------------------
// Build Job
// ---------------------------------------------------------------------------

export interface BuildJob {
  readonly vendor: string;
  readonly release: string;
  /** Host path of the source checkout. */
  readonly sourceDir: string;
  /** Host path of the install tree (InstallTree root). */
  readonly outputDir: string;
  /** Host path of the synthesized helper scripts. */
  readonly toolkitDir: string;
  /** Host path of the compiler cache, or null to build without one. */
  readonly cacheDir: string | null;
  readonly withDebug: boolean;
  readonly withTests: boolean;
  /** Delete the out-of-tree build directory of the source tree first. */
  readonly freshBuild: boolean;
  /** Delete the install tree first. */
  readonly nukeInstall: boolean;
}

// ---------------------------------------------------------------------------
// Build Steps
// ---------------------------------------------------------------------------

export const BUILD_STEPS = [
  'admissibility',
  'layout',
  'version',
  'sources',
  'synthesize',
  'build',
  'install',
  'install-section',
] as const;

export type BuildStepId = (typeof BUILD_STEPS)[number];

/** Host paths of the scripts written during the synthesize step. */
export interface ToolkitScripts {
  readonly build: string;
  readonly install: string;
  readonly installSection: string;
  readonly postInstall: string;
}

export interface BuildResult {
  readonly version: VersionDescriptor;
  readonly builderImage: ImageRef;
  readonly scripts: ToolkitScripts;
  /** Edits and placeholders that matched while rendering the working spec. */
  readonly appliedEdits: ReadonlyArray<string>;
  readonly malformedAttrs: ReadonlyArray<MalformedAttr>;
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export interface ComposeRequest {
  /** Host path of the install tree; read-only here. */
  readonly installTree: string;
  readonly base: ImageRef;
  readonly vendor: string;
  readonly release: string;
  /** Named builds also get a `latest` tag. */
  readonly buildName?: string | undefined;
}

export interface ComposeResult {
  readonly image: ImageRef;
  readonly latest: ImageRef | null;
  readonly postInstallRan: boolean;
}
