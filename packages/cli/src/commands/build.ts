/**
 * crucible build — Compile a source tree and compose a runtime image
 *
 *   crucible build <vendor> <release> <source> [--buildname NAME]
 *     [--skip-build] [--skip-container] [--incremental]
 *     [--with-debug] [--with-tests]
 *     [--with-fresh-build] [--nuke-install] [--yes]
 *
 * The build step runs the Build Driver in the builder image; the container
 * step composes the install tree onto the release base (or, with
 * --incremental, onto the build's latest image when there is one).
 *
 * --with-fresh-build and --nuke-install delete the source tree's build
 * directory and the install tree before building. They are confirmed on a
 * terminal, or with --yes.
 *
 * Composing needs a user namespace when not run as root, so the invocation
 * re-executes itself under `buildah unshare` first.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { ConfigurationError, assertImageComponent, resolveComposeBase } from '@crucible/kernel';
import type { BuildJob } from '@crucible/kernel';
import { anonymousBuildName, buildLayout, provisionCcache } from '@crucible/runtime-host';
import type { BuildRecord } from '@crucible/runtime-host';
import { buildDriver, imageComposer, loadRuntime, type RuntimeOptions } from '../runtime.js';
import { guarded } from '../failure.js';
import { confirm, isInteractive } from '../prompt.js';
import { mustReexec, reexecUnderUnshare } from '../userns.js';
import { withRuntimeOptions } from './options.js';
import { t } from '../output/theme.js';

export interface BuildOptions extends RuntimeOptions {
  readonly buildname?: string | undefined;
  readonly skipBuild: boolean;
  readonly skipContainer: boolean;
  readonly incremental: boolean;
  readonly withDebug: boolean;
  readonly withTests: boolean;
  readonly withFreshBuild: boolean;
  readonly nukeInstall: boolean;
  readonly yes: boolean;
}

export interface BuildRequest {
  readonly vendor: string;
  readonly release: string;
  readonly sourceDir: string;
  /** Directory name under buildsDir. */
  readonly dirName: string;
  /** Set for named builds only. */
  readonly buildName: string | undefined;
  readonly withDebug: boolean;
  readonly withTests: boolean;
  readonly freshBuild: boolean;
  readonly nukeInstall: boolean;
}

/**
 * Combine the arguments with the registered record of a named build.
 * Flags from the record stay on; a record for another vendor or release is
 * an error.
 */
export function resolveBuildRequest(
  vendor: string,
  release: string,
  source: string,
  options: BuildOptions,
  record: BuildRecord | undefined,
  now: Date,
): BuildRequest {
  assertImageComponent('vendor', vendor);
  assertImageComponent('release', release);

  const buildName = options.buildname;
  if (buildName !== undefined) {
    assertImageComponent('build name', buildName);
  }
  if (record !== undefined && (record.vendor !== vendor || record.release !== release)) {
    throw new ConfigurationError(
      `build '${record.name}' is registered for ${record.vendor}/${record.release}, not ${vendor}/${release}`,
    );
  }
  if (options.skipBuild && (options.withFreshBuild || options.nukeInstall)) {
    throw new ConfigurationError('--with-fresh-build and --nuke-install need the build step; drop --skip-build');
  }

  return {
    vendor,
    release,
    sourceDir: resolve(source),
    dirName: buildName ?? anonymousBuildName(vendor, release, now),
    buildName,
    withDebug: options.withDebug || record?.withDebug === true,
    withTests: options.withTests || record?.withTests === true,
    freshBuild: options.withFreshBuild,
    nukeInstall: options.nukeInstall,
  };
}

/** Questions to put to the operator before the build deletes anything. */
export function cleanupQuestions(request: BuildRequest): string[] {
  const questions: string[] = [];
  if (request.nukeInstall) {
    questions.push('Are you sure you want to remove the install directory?');
  }
  if (request.freshBuild) {
    questions.push('Are you sure you want to run a fresh build?');
  }
  return questions;
}

export interface ConfirmDeps {
  readonly interactive: boolean;
  readonly confirm: (question: string) => Promise<boolean>;
}

/**
 * True when every deletion is confirmed. Off a terminal, deleting needs
 * --yes.
 */
export async function confirmCleanup(request: BuildRequest, yes: boolean, deps: ConfirmDeps): Promise<boolean> {
  const questions = cleanupQuestions(request);
  if (yes || questions.length === 0) return true;
  if (!deps.interactive) {
    throw new ConfigurationError('refusing to delete build output without --yes when not on a terminal');
  }
  for (const question of questions) {
    if (!(await deps.confirm(question))) return false;
  }
  return true;
}

export const buildCommand = withRuntimeOptions(
  new Command('build')
    .description('Build a source tree in the builder image and compose a runtime image')
    .argument('<vendor>', 'Distribution vendor')
    .argument('<release>', 'Distribution release')
    .argument('<source>', 'Source tree to build')
    .option('--buildname <name>', 'Name the build; its images are tagged <name>:latest')
    .option('--skip-build', 'Reuse the existing install tree', false)
    .option('--skip-container', 'Do not compose a runtime image', false)
    .option('--incremental', "Compose onto the build's latest image when present", false)
    .option('--with-debug', 'Keep debug information (unstripped install)', false)
    .option('--with-tests', 'Compile the test suites', false)
    .option('--with-fresh-build', "Remove the source tree's build directory first", false)
    .option('--nuke-install', 'Remove the install directory first', false)
    .option('--yes', 'Do not ask before removing anything', false),
).action(
  guarded('build', async (vendor: string, release: string, source: string, options: BuildOptions) => {
    const rt = loadRuntime(options);

    const record = options.buildname === undefined ? undefined : rt.registry.get(options.buildname);
    const request = resolveBuildRequest(vendor, release, source, options, record, new Date());

    if (!(await confirmCleanup(request, options.yes, { interactive: isInteractive(), confirm }))) {
      // eslint-disable-next-line no-console
      console.log('Aborted.');
      process.exitCode = 1;
      return;
    }

    if (!options.skipContainer && mustReexec()) {
      // Already confirmed here; the re-executed invocation must not ask again.
      const confirmed = cleanupQuestions(request).length > 0 ? ['--yes'] : [];
      process.exitCode = await reexecUnderUnshare(rt.exec, confirmed);
      return;
    }

    const layout = buildLayout(rt.config.buildsDir, request.dirName);

    if (!options.skipBuild) {
      const cacheDir =
        rt.config.ccacheDir === null
          ? null
          : await provisionCcache(rt.exec, rt.fs, rt.config.ccacheDir, vendor, release, rt.config.ccacheSize);

      const job: BuildJob = {
        vendor,
        release,
        sourceDir: request.sourceDir,
        outputDir: layout.install,
        toolkitDir: layout.toolkit,
        cacheDir,
        withDebug: request.withDebug,
        withTests: request.withTests,
        freshBuild: request.freshBuild,
        nukeInstall: request.nukeInstall,
      };
      const result = await buildDriver(rt).run(job);

      // eslint-disable-next-line no-console
      console.log(`${t.green('built')} ${result.version.version} with ${result.builderImage}`);
      // eslint-disable-next-line no-console
      console.log(`  install tree: ${layout.install}`);
      if (result.malformedAttrs.length > 0) {
        // eslint-disable-next-line no-console
        console.log(t.amber(`  ${result.malformedAttrs.length} malformed %attr line(s) skipped`));
      }
    }

    if (!options.skipContainer) {
      if ((await rt.fs.kind(layout.install)) !== 'directory') {
        throw new ConfigurationError(`no install tree at ${layout.install}; run without --skip-build`);
      }
      const base = await resolveComposeBase(rt.store, rt.naming, {
        vendor,
        release,
        buildName: request.buildName,
        incremental: options.incremental,
      });
      if (options.incremental && !base.incremental) {
        // eslint-disable-next-line no-console
        console.log(t.amber(`  no previous image for this build; composing onto ${base.ref}`));
      }

      const composed = await imageComposer(rt).compose({
        installTree: layout.install,
        base: base.ref,
        vendor,
        release,
        buildName: request.buildName,
      });

      // eslint-disable-next-line no-console
      console.log(`${t.green('image')} ${composed.image}`);
      if (composed.latest !== null) {
        // eslint-disable-next-line no-console
        console.log(`  tagged ${composed.latest}`);
      }
    }
  }),
);
