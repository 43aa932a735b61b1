/**
 * Crucible Runtime Host — Configuration
 *
 * A single JSON file, by default `<home>/config.json`. Validation is by
 * hand-written guards; unknown keys are rejected so a misspelled field is
 * not silently ignored. Relative paths resolve against the directory of the
 * config file.
 *
 * Only `buildsDir` is required. Everything else has a default.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@crucible/kernel';
import type { ImageNaming } from '@crucible/kernel';
import { DEFAULT_CCACHE_SIZE } from './ccache.js';
import { isNodeError } from './adapters/fs.js';

export type TreeSyncKind = 'rsync' | 'node';

export interface CrucibleConfig {
  /** Parent of every build's output directory. */
  readonly buildsDir: string;
  /** Root of the per-release compiler caches; null disables ccache. */
  readonly ccacheDir: string | null;
  readonly ccacheSize: string;
  readonly imageNamespace: string;
  readonly seedTag: string;
  /** Directory of the stage Containerfiles; also the image build context. */
  readonly recipesDir: string;
  readonly projectName: string;
  /** Recipe template, relative to the source tree. */
  readonly recipeFile: string;
  readonly treeSync: TreeSyncKind;
}

/** Fields as written to disk; everything but buildsDir is optional. */
export type ConfigInput = Partial<CrucibleConfig> & { readonly buildsDir: string };

/** `images/` at the root of this repository. */
export const DEFAULT_RECIPES_DIR = fileURLToPath(new URL('../../../images/', import.meta.url));

export const CONFIG_DEFAULTS = {
  ccacheSize: DEFAULT_CCACHE_SIZE,
  imageNamespace: 'crucible',
  seedTag: 'leap-15.2',
  projectName: 'ceph',
  recipeFile: 'ceph.spec.in',
  treeSync: 'rsync',
} as const satisfies Partial<CrucibleConfig>;

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'buildsDir',
  'ccacheDir',
  'ccacheSize',
  'imageNamespace',
  'seedTag',
  'recipesDir',
  'projectName',
  'recipeFile',
  'treeSync',
]);

const SIZE_PATTERN = /^[1-9][0-9]*[GT]$/;
const NAME_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function isTreeSyncKind(value: unknown): value is TreeSyncKind {
  return value === 'rsync' || value === 'node';
}

/**
 * Validate parsed JSON and apply defaults.
 *
 * @param raw - Parsed file content
 * @param baseDir - Directory relative paths resolve against
 * @throws {ConfigurationError} On any invalid or unknown field
 */
export function parseConfig(raw: unknown, baseDir: string): CrucibleConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError('config must be a JSON object');
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigurationError(`unknown config key '${key}'`);
    }
  }

  const field = (key: string): unknown => Reflect.get(raw, key);

  const optionalString = (key: string): string | undefined => {
    const value = field(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || value === '') {
      throw new ConfigurationError(`config '${key}' must be a non-empty string`);
    }
    return value;
  };

  const path = (value: string): string => (isAbsolute(value) ? value : resolve(baseDir, value));

  const buildsDir = optionalString('buildsDir');
  if (buildsDir === undefined) {
    throw new ConfigurationError(`config 'buildsDir' is required`);
  }

  const ccacheDir = optionalString('ccacheDir');
  const ccacheSize = optionalString('ccacheSize') ?? CONFIG_DEFAULTS.ccacheSize;
  if (!SIZE_PATTERN.test(ccacheSize)) {
    throw new ConfigurationError(`config 'ccacheSize' must look like 10G or 1T, got '${ccacheSize}'`);
  }

  const imageNamespace = optionalString('imageNamespace') ?? CONFIG_DEFAULTS.imageNamespace;
  const seedTag = optionalString('seedTag') ?? CONFIG_DEFAULTS.seedTag;
  for (const [key, value] of [
    ['imageNamespace', imageNamespace],
    ['seedTag', seedTag],
  ] as const) {
    if (!NAME_PATTERN.test(value)) {
      throw new ConfigurationError(
        `config '${key}' must use lowercase letters, digits, '.', '_' or '-', got '${value}'`,
      );
    }
  }

  const treeSync = field('treeSync') ?? CONFIG_DEFAULTS.treeSync;
  if (!isTreeSyncKind(treeSync)) {
    throw new ConfigurationError(`config 'treeSync' must be 'rsync' or 'node'`);
  }

  const recipesDir = optionalString('recipesDir');

  return {
    buildsDir: path(buildsDir),
    ccacheDir: ccacheDir === undefined ? null : path(ccacheDir),
    ccacheSize,
    imageNamespace,
    seedTag,
    recipesDir: recipesDir === undefined ? DEFAULT_RECIPES_DIR : path(recipesDir),
    projectName: optionalString('projectName') ?? CONFIG_DEFAULTS.projectName,
    recipeFile: optionalString('recipeFile') ?? CONFIG_DEFAULTS.recipeFile,
    treeSync,
  };
}

// ---------------------------------------------------------------------------
// File I/O
// ---------------------------------------------------------------------------

/**
 * @throws {ConfigurationError} If the file is missing, not JSON, or invalid
 */
export function loadConfig(configPath: string): CrucibleConfig {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new ConfigurationError(`config file not found: ${configPath} (run 'crucible init')`);
    }
    throw new ConfigurationError(`cannot read config file ${configPath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigurationError(`config file ${configPath} is not valid JSON`, { cause: err });
  }

  try {
    return parseConfig(raw, dirname(configPath));
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${configPath}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Validate and write a config file. Only the given fields are written, so
 * defaults stay defaults.
 */
export function writeConfig(configPath: string, input: ConfigInput): void {
  const entries = Object.entries(input).filter(([, value]) => value !== undefined && value !== null);
  const content: Record<string, unknown> = Object.fromEntries(entries);
  parseConfig(content, dirname(configPath));
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(content, null, 2) + '\n', 'utf-8');
}

export function imageNaming(config: CrucibleConfig): ImageNaming {
  return { namespace: config.imageNamespace, seedTag: config.seedTag };
}
