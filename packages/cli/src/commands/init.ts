/**
 * crucible init — Write the configuration file
 *
 * Values come from flags; a missing --builds-dir is prompted for when a
 * terminal is attached. An existing file is only replaced with --force.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { ConfigurationError } from '@crucible/kernel';
import { isTreeSyncKind, resolveCrucibleHome, writeConfig, type ConfigInput, type TreeSyncKind } from '@crucible/runtime-host';
import { resolveConfigPath, type RuntimeOptions } from '../runtime.js';
import { guarded } from '../failure.js';
import { ask, isInteractive } from '../prompt.js';
import { withRuntimeOptions } from './options.js';

interface InitOptions extends RuntimeOptions {
  readonly buildsDir?: string | undefined;
  readonly ccacheDir?: string | undefined;
  readonly ccacheSize?: string | undefined;
  readonly namespace?: string | undefined;
  readonly recipesDir?: string | undefined;
  readonly treeSync?: string | undefined;
  readonly rememberHome: boolean;
  readonly force: boolean;
}

function parseTreeSync(value: string | undefined): TreeSyncKind | undefined {
  if (value === undefined || isTreeSyncKind(value)) return value;
  throw new ConfigurationError(`--tree-sync must be 'rsync' or 'node'`);
}

export const initCommand = withRuntimeOptions(
  new Command('init')
    .description('Create the configuration file')
    .option('--builds-dir <dir>', 'Directory that holds build outputs')
    .option('--ccache-dir <dir>', 'Root of the compiler caches (omit to build without ccache)')
    .option('--ccache-size <size>', 'Compiler cache size limit, e.g. 10G')
    .option('--namespace <name>', 'Image namespace')
    .option('--recipes-dir <dir>', 'Directory of the stage Containerfiles')
    .option('--tree-sync <kind>', "How install trees are copied: 'rsync' or 'node'")
    .option('--remember-home', 'Use this --home for later invocations', false)
    .option('--force', 'Replace an existing configuration file', false),
).action(
  guarded('init', async (options: InitOptions) => {
    if (options.rememberHome) {
      resolveCrucibleHome({ home: options.home, persist: true });
    }
    const { configPath } = resolveConfigPath(options);
    if (existsSync(configPath) && !options.force) {
      throw new ConfigurationError(`${configPath} already exists (use --force to replace it)`);
    }

    let buildsDir = options.buildsDir;
    if (buildsDir === undefined && isInteractive()) {
      buildsDir = await ask('Directory for build outputs');
    }
    if (buildsDir === undefined || buildsDir === '') {
      throw new ConfigurationError('--builds-dir is required');
    }

    const optionalPath = (value: string | undefined): string | undefined =>
      value === undefined ? undefined : resolve(value);

    const input: ConfigInput = {
      buildsDir: resolve(buildsDir),
      ccacheDir: optionalPath(options.ccacheDir),
      ccacheSize: options.ccacheSize,
      imageNamespace: options.namespace,
      recipesDir: optionalPath(options.recipesDir),
      treeSync: parseTreeSync(options.treeSync),
    };
    writeConfig(configPath, input);

    // eslint-disable-next-line no-console
    console.log(`Wrote ${configPath}`);
  }),
);
