/**
 * crucible destroy — Remove a named build
 *
 *   crucible destroy <buildname> [--remove-install] [--remove-images] [--yes]
 *
 * Always removes the registry record. --remove-install deletes the build
 * directory; --remove-images removes every final image of the build.
 * Without --yes the operator confirms on a terminal.
 */

import { Command } from 'commander';
import { ConfigurationError, finalRepository } from '@crucible/kernel';
import { buildLayout } from '@crucible/runtime-host';
import { loadRuntime, type RuntimeOptions } from '../runtime.js';
import { guarded } from '../failure.js';
import { confirm, isInteractive } from '../prompt.js';
import { withRuntimeOptions } from './options.js';

interface DestroyOptions extends RuntimeOptions {
  readonly removeInstall: boolean;
  readonly removeImages: boolean;
  readonly yes: boolean;
}

export const destroyCommand = withRuntimeOptions(
  new Command('destroy')
    .description('Remove a named build')
    .argument('<buildname>', 'Build name')
    .option('--remove-install', 'Delete the build directory', false)
    .option('--remove-images', "Remove the build's images", false)
    .option('--yes', 'Do not ask for confirmation', false),
).action(
  guarded('destroy', async (name: string, options: DestroyOptions) => {
    const rt = loadRuntime(options);
    const build = rt.registry.require(name);
    const layout = buildLayout(rt.config.buildsDir, name);
    const repository = finalRepository(rt.naming, build.vendor, build.release, name);
    const images = options.removeImages ? await rt.store.list(repository) : [];

    // eslint-disable-next-line no-console
    console.log(`Destroying build '${name}' (${build.vendor}/${build.release})`);
    if (options.removeInstall) {
      // eslint-disable-next-line no-console
      console.log(`  delete ${layout.root}`);
    }
    for (const image of images) {
      // eslint-disable-next-line no-console
      console.log(`  remove ${image.ref}`);
    }

    if (!options.yes) {
      if (!isInteractive()) {
        throw new ConfigurationError('refusing to destroy without --yes when not on a terminal');
      }
      if (!(await confirm('Proceed?'))) {
        // eslint-disable-next-line no-console
        console.log('Aborted.');
        return;
      }
    }

    for (const image of images) {
      await rt.store.remove(image.ref);
    }
    if (options.removeInstall) {
      await rt.fs.remove(layout.root);
    }
    rt.registry.remove(name);

    // eslint-disable-next-line no-console
    console.log(`Build '${name}' destroyed.`);
  }),
);
