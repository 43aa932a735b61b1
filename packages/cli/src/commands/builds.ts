/**
 * crucible builds | images | shell — Inspect named builds
 *
 *   crucible builds                 list registered builds
 *   crucible images <buildname>     list a build's final images
 *   crucible shell <buildname>      interactive shell in the build's latest image
 */

import { Command } from 'commander';
import { ConfigurationError, finalRepository, latestImage } from '@crucible/kernel';
import { loadRuntime, type RuntimeOptions } from '../runtime.js';
import { guarded } from '../failure.js';
import { withRuntimeOptions } from './options.js';
import { formatImageRow, groupBuildImages } from '../output/images.js';
import { t } from '../output/theme.js';

export const buildsCommand = withRuntimeOptions(
  new Command('builds').description('List registered builds'),
).action(
  guarded('builds', async (options: RuntimeOptions) => {
    const rt = loadRuntime(options);
    const builds = rt.registry.list();

    if (builds.length === 0) {
      // eslint-disable-next-line no-console
      console.log('No builds. Run `crucible create <buildname> <vendor> <release> <sourcedir>` to add one.');
      return;
    }

    for (const build of builds) {
      const flags = [build.withDebug ? 'debug' : '', build.withTests ? 'tests' : ''].filter((f) => f !== '');
      // eslint-disable-next-line no-console
      console.log(
        `${t.blue(build.name)}  ${build.vendor}/${build.release}  ${build.sourceDir}` +
          (flags.length > 0 ? t.muted(`  [${flags.join(', ')}]`) : ''),
      );
    }
  }),
);

export const imagesCommand = withRuntimeOptions(
  new Command('images')
    .description('List the final images of a build')
    .argument('<buildname>', 'Build name'),
).action(
  guarded('images', async (name: string, options: RuntimeOptions) => {
    const rt = loadRuntime(options);
    const build = rt.registry.require(name);
    const images = await rt.store.list(finalRepository(rt.naming, build.vendor, build.release, name));
    const rows = groupBuildImages(images);

    if (rows.length === 0) {
      // eslint-disable-next-line no-console
      console.log(`No images for build '${name}'.`);
      return;
    }
    for (const row of rows) {
      // eslint-disable-next-line no-console
      console.log(formatImageRow(row));
    }
  }),
);

export const shellCommand = withRuntimeOptions(
  new Command('shell')
    .description("Open a shell in a build's latest image")
    .argument('<buildname>', 'Build name'),
).action(
  guarded('shell', async (name: string, options: RuntimeOptions) => {
    const rt = loadRuntime(options);
    rt.registry.require(name);
    const image = latestImage(rt.naming, name);
    if (!(await rt.store.exists(image))) {
      throw new ConfigurationError(`build '${name}' has no image yet; run 'crucible build … --buildname ${name}'`);
    }
    await rt.runner.shell(image);
  }),
);
