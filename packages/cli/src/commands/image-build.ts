/**
 * crucible image-build — Build or refresh the cached stage images
 *
 *   crucible image-build <vendor> <release> [--force]
 *
 * Walks bootstrap → release-base → build-environment, building each image
 * that is absent (or every image with --force).
 */

import { Command } from 'commander';
import { loadRuntime, stageCache, type RuntimeOptions } from '../runtime.js';
import { guarded } from '../failure.js';
import { withRuntimeOptions } from './options.js';
import { t } from '../output/theme.js';

interface ImageBuildOptions extends RuntimeOptions {
  readonly force: boolean;
}

export const imageBuildCommand = withRuntimeOptions(
  new Command('image-build')
    .description('Build the seed, release and builder images for a vendor and release')
    .argument('<vendor>', 'Distribution vendor (e.g. opensuse)')
    .argument('<release>', 'Distribution release (e.g. leap-15.2)')
    .option('--force', 'Rebuild every stage even when its image exists', false),
).action(
  guarded('image-build', async (vendor: string, release: string, options: ImageBuildOptions) => {
    const rt = loadRuntime(options);
    const outcomes = await stageCache(rt).ensure(vendor, release, { force: options.force });

    for (const outcome of outcomes) {
      const status = outcome.status === 'built' ? t.green('built  ') : t.muted('present');
      // eslint-disable-next-line no-console
      console.log(`${status}  ${outcome.stage.padEnd(17)}  ${outcome.image}`);
    }
  }),
);
