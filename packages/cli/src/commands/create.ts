/**
 * crucible create — Register a named build
 *
 *   crucible create <buildname> <vendor> <release> <sourcedir>
 *     [--with-debug] [--with-tests]
 *     [--clone-from-repo URL [--clone-from-branch BRANCH]]
 *
 * The release image must already exist. With --clone-from-repo the source
 * directory is created by cloning; otherwise it must exist. In both cases
 * the recipe file must be present in the tree.
 */

import { join, resolve } from 'node:path';
import { Command } from 'commander';
import { ConfigurationError, SpecNotFoundError, releaseBaseImage } from '@crucible/kernel';
import { buildLayout } from '@crucible/runtime-host';
import { loadRuntime, type RuntimeOptions } from '../runtime.js';
import { guarded } from '../failure.js';
import { withRuntimeOptions } from './options.js';

interface CreateOptions extends RuntimeOptions {
  readonly withDebug: boolean;
  readonly withTests: boolean;
  readonly cloneFromRepo?: string | undefined;
  readonly cloneFromBranch?: string | undefined;
}

export const createCommand = withRuntimeOptions(
  new Command('create')
    .description('Register a named build')
    .argument('<buildname>', 'Build name (lowercase letters, digits, . _ -)')
    .argument('<vendor>', 'Distribution vendor')
    .argument('<release>', 'Distribution release')
    .argument('<sourcedir>', 'Source tree (created when cloning)')
    .option('--with-debug', 'Keep debug information', false)
    .option('--with-tests', 'Compile the test suites', false)
    .option('--clone-from-repo <url>', 'Clone the source tree from this repository')
    .option('--clone-from-branch <branch>', 'Branch to clone'),
).action(
  guarded('create', async (name: string, vendor: string, release: string, sourcedir: string, options: CreateOptions) => {
    const rt = loadRuntime(options);
    if (rt.registry.get(name) !== undefined) {
      throw new ConfigurationError(`build '${name}' already exists`);
    }
    if (options.cloneFromBranch !== undefined && options.cloneFromRepo === undefined) {
      throw new ConfigurationError('--clone-from-branch needs --clone-from-repo');
    }

    const base = releaseBaseImage(rt.naming, vendor, release);
    if (!(await rt.store.exists(base))) {
      throw new ConfigurationError(
        `release image ${base} not found; run 'crucible image-build ${vendor} ${release}' first`,
      );
    }

    const sourceDir = resolve(sourcedir);
    const sourceKind = await rt.fs.kind(sourceDir);
    if (options.cloneFromRepo !== undefined) {
      if (sourceKind !== 'missing') {
        throw new ConfigurationError(`cannot clone into ${sourceDir}: it already exists`);
      }
      await rt.vcs.clone(options.cloneFromRepo, sourceDir, options.cloneFromBranch);
    } else if (sourceKind !== 'directory') {
      throw new ConfigurationError(`source directory not found: ${sourceDir}`);
    }

    const recipe = join(sourceDir, rt.config.recipeFile);
    if ((await rt.fs.kind(recipe)) !== 'file') {
      throw new SpecNotFoundError(recipe);
    }

    rt.registry.add({
      name,
      vendor,
      release,
      sourceDir,
      withDebug: options.withDebug,
      withTests: options.withTests,
      createdAt: new Date().toISOString(),
    });
    const layout = buildLayout(rt.config.buildsDir, name);
    await rt.fs.ensureDir(layout.root);

    // eslint-disable-next-line no-console
    console.log(`Created build '${name}' (${vendor}/${release})`);
    // eslint-disable-next-line no-console
    console.log(`  source: ${sourceDir}`);
    // eslint-disable-next-line no-console
    console.log(`  output: ${layout.root}`);
    // eslint-disable-next-line no-console
    console.log(`Next: crucible build ${vendor} ${release} ${sourceDir} --buildname ${name}`);
  }),
);
