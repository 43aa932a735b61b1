/**
 * Crucible Kernel — Build Driver
 *
 * Runs one BuildJob through a fixed sequence of steps:
 *
 *   admissibility    source tree, recipe file and builder image exist
 *   layout           output dir usable; toolkit stamp matches this job;
 *                    build dir and install tree cleared when asked to
 *   version          version descriptor from the source tree
 *   sources          submodules synced and updated
 *   synthesize       working spec rendered, resolved, scripts written
 *   build            %build body in the builder container
 *   install          install target (stripped unless debug info is kept)
 *   install-section  remainder of the %install body
 *
 * Each failure is rethrown as a BuildStepError naming the step. The output
 * directory may already hold a previous install tree; it is built over
 * unless the job sets nukeInstall. freshBuild removes <source>/build so
 * the next configure starts from scratch.
 */

import { join } from 'node:path';
import { parseDescribe, renderWorkingSpec, synthesizeScripts } from '@crucible/specfile';
import type {
  ContainerRunner,
  ImageStore,
  PathKind,
  SpecResolver,
  VersionControl,
  WorkspaceFs,
} from '../adapters/index.js';
import { BuildStepError, ConfigurationError, SpecNotFoundError, messageOf } from '../errors.js';
import type { BuildLogger } from '../logging/build-log.js';
import { builderImage } from '../stages/plan.js';
import {
  BUILD_SUBDIR,
  CONTAINER_PATHS,
  POST_INSTALL_SCRIPT,
  type BuildJob,
  type BuildResult,
  type BuildStepId,
  type ToolkitScripts,
} from '../types/job.js';
import type { ImageNaming } from '../types/stage.js';
import { buildEnvironment, buildMounts } from './environment.js';
import { STAMP_FILE, makeStamp, parseStamp } from './stamp.js';

export interface BuildDriverDeps {
  readonly fs: WorkspaceFs;
  readonly store: ImageStore;
  readonly vcs: VersionControl;
  readonly resolver: SpecResolver;
  readonly runner: ContainerRunner;
  readonly naming: ImageNaming;
  /** Project name used for the tarball basename and the working spec. */
  readonly projectName: string;
  /** Recipe template, relative to the source tree. */
  readonly recipeFile: string;
  readonly logger?: BuildLogger | undefined;
}

const SCRIPT_MODE = 0o755;

export class BuildDriver {
  constructor(private readonly deps: BuildDriverDeps) {}

  async run(job: BuildJob): Promise<BuildResult> {
    const builder = builderImage(this.deps.naming, job.vendor, job.release);
    const templatePath = join(job.sourceDir, this.deps.recipeFile);

    await this.step(job, 'admissibility', () => this.checkAdmissible(job, templatePath, builder));
    await this.step(job, 'layout', () => this.prepareLayout(job));
    const version = await this.step(job, 'version', async () =>
      parseDescribe(await this.deps.vcs.describe(job.sourceDir)),
    );
    await this.step(job, 'sources', () => this.deps.vcs.prepareSubmodules(job.sourceDir));

    const synthesized = await this.step(job, 'synthesize', async () => {
      const template = await this.deps.fs.readText(templatePath);
      const rendered = renderWorkingSpec(template, version, {
        projectName: this.deps.projectName,
        installRoot: CONTAINER_PATHS.output,
      });

      const specPath = join(job.toolkitDir, `${this.deps.projectName}.spec`);
      await this.deps.fs.writeText(specPath, rendered.text);
      const resolved = await this.deps.resolver.resolve(specPath, builder);

      const scripts = synthesizeScripts(resolved, {
        sourceRoot: CONTAINER_PATHS.source,
        installRoot: CONTAINER_PATHS.output,
        buildSubdir: BUILD_SUBDIR,
        stripped: !job.withDebug,
      });

      for (const malformed of scripts.malformedAttrs) {
        this.deps.logger?.record(job.vendor, job.release, {
          kind: 'attr.malformed',
          step: 'synthesize',
          detail: `line ${malformed.line}: ${malformed.reason}: ${malformed.text}`,
        });
      }

      const paths: ToolkitScripts = {
        build: join(job.toolkitDir, 'build.sh'),
        install: join(job.toolkitDir, 'install.sh'),
        installSection: join(job.toolkitDir, 'install-section.sh'),
        postInstall: join(job.outputDir, POST_INSTALL_SCRIPT),
      };
      await this.deps.fs.writeText(paths.build, scripts.buildScript, SCRIPT_MODE);
      await this.deps.fs.writeText(paths.install, scripts.installScript, SCRIPT_MODE);
      await this.deps.fs.writeText(paths.installSection, scripts.installSectionScript, SCRIPT_MODE);
      await this.deps.fs.writeText(paths.postInstall, scripts.postInstallScript, SCRIPT_MODE);

      return { paths, applied: rendered.applied, malformed: scripts.malformedAttrs };
    });

    await this.step(job, 'build', () => this.runToolkitScript(job, builder, 'build.sh'));
    await this.step(job, 'install', () => this.runToolkitScript(job, builder, 'install.sh'));
    await this.step(job, 'install-section', () =>
      this.runToolkitScript(job, builder, 'install-section.sh'),
    );

    return {
      version,
      builderImage: builder,
      scripts: synthesized.paths,
      appliedEdits: synthesized.applied,
      malformedAttrs: synthesized.malformed,
    };
  }

  // -------------------------------------------------------------------------
  // Steps
  // -------------------------------------------------------------------------

  private async checkAdmissible(job: BuildJob, templatePath: string, builder: string): Promise<void> {
    const { fs, store } = this.deps;

    if ((await fs.kind(job.sourceDir)) !== 'directory') {
      throw new ConfigurationError(`source directory not found: ${job.sourceDir}`);
    }
    if ((await fs.kind(templatePath)) !== 'file') {
      throw new SpecNotFoundError(templatePath);
    }
    if (job.cacheDir !== null && (await fs.kind(job.cacheDir)) !== 'directory') {
      throw new ConfigurationError(`compiler cache directory not found: ${job.cacheDir}`);
    }
    if (!(await store.exists(builder))) {
      throw new ConfigurationError(`builder image ${builder} not found; run image-build first`);
    }
  }

  private async prepareLayout(job: BuildJob): Promise<void> {
    const { fs } = this.deps;

    const outputKind = await fs.kind(job.outputDir);
    if (outputKind !== 'directory' && outputKind !== 'missing') {
      throw new ConfigurationError(`output path exists and is not a directory: ${job.outputDir}`);
    }

    if (job.freshBuild) {
      const buildDir = join(job.sourceDir, BUILD_SUBDIR);
      const buildKind = await fs.kind(buildDir);
      if (buildKind !== 'directory' && buildKind !== 'missing') {
        throw new ConfigurationError(`build path exists and is not a directory: ${buildDir}`);
      }
      await this.clear(job, buildDir, buildKind);
    }
    if (job.nukeInstall) {
      await this.clear(job, job.outputDir, outputKind);
    }

    await fs.ensureDir(job.outputDir);
    await fs.ensureDir(job.toolkitDir);

    const stampPath = join(job.toolkitDir, STAMP_FILE);
    const expected = makeStamp(job);

    if ((await fs.kind(stampPath)) === 'file') {
      const found = parseStamp(await fs.readText(stampPath));
      if (found === null || found.fingerprint !== expected.fingerprint) {
        const owner = found === null ? 'an unreadable stamp' : `${found.vendor}/${found.release} from ${found.sourceDir}`;
        throw new ConfigurationError(
          `toolkit ${job.toolkitDir} belongs to ${owner}, not ${job.vendor}/${job.release} from ${job.sourceDir}`,
        );
      }
      return;
    }
    await fs.writeText(stampPath, JSON.stringify(expected, null, 2) + '\n');
  }

  private async clear(job: BuildJob, dir: string, kind: PathKind): Promise<void> {
    if (kind !== 'directory') return;
    await this.deps.fs.remove(dir);
    this.deps.logger?.record(job.vendor, job.release, { kind: 'layout.cleared', step: 'layout', detail: dir });
  }

  private runToolkitScript(job: BuildJob, image: string, script: string): Promise<void> {
    return this.deps.runner.run({
      image,
      mounts: buildMounts(job),
      env: buildEnvironment(job),
      script: `${CONTAINER_PATHS.toolkit}/${script}`,
    });
  }

  // -------------------------------------------------------------------------
  // Step bookkeeping
  // -------------------------------------------------------------------------

  private async step<T>(job: BuildJob, id: BuildStepId, body: () => Promise<T>): Promise<T> {
    const { logger } = this.deps;
    logger?.record(job.vendor, job.release, { kind: 'step.started', step: id });
    try {
      const result = await body();
      logger?.record(job.vendor, job.release, { kind: 'step.completed', step: id });
      return result;
    } catch (err: unknown) {
      logger?.record(job.vendor, job.release, { kind: 'step.failed', step: id, detail: messageOf(err) });
      throw new BuildStepError(id, err);
    }
  }
}
