/**
 * Crucible Runtime Host — Home Directory Resolution
 *
 * Resolves the Crucible home directory using the following precedence:
 *
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. CRUCIBLE_HOME environment variable
 *   3. OS application config file (last home chosen with --home --persist)
 *   4. Default: ~/.crucible
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     config.json        — default configuration file
 *     state/builds.json  — build registry
 *     logs/events.jsonl  — build event log
 *     locks/             — stage locks
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir, platform } from 'node:os';
import { isNodeError } from './adapters/fs.js';

export const HOME_ENV = 'CRUCIBLE_HOME';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the application config file:
 *
 *   macOS:   ~/Library/Preferences/crucible/config.json
 *   Windows: %APPDATA%\crucible\config.json
 *   Linux:   ~/.config/crucible/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'crucible', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'crucible', 'config.json');
    }
    default:
      return join(home, '.config', 'crucible', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * Returns null when the file is absent, is not JSON, or has no non-empty
 * `home` string.
 */
export function readHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || err instanceof SyntaxError) return null;
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const home: unknown = Reflect.get(parsed, 'home');
  return typeof home === 'string' && home !== '' ? home : null;
}

export function writeHomeToConfig(home: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveCrucibleHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Persist an explicit home to the OS config file. Default: false. */
  readonly persist?: boolean | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Override of getOsConfigPath(), for tests. */
  readonly osConfigPath?: string | undefined;
}

/**
 * Resolve the Crucible home directory, creating it if needed.
 *
 * @returns An absolute path
 */
export function resolveCrucibleHome(opts: ResolveCrucibleHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const osConfigPath = opts.osConfigPath ?? getOsConfigPath();
  const fromEnv = env[HOME_ENV];

  let home: string;
  if (typeof opts.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readHomeFromConfig(osConfigPath) ?? join(homedir(), '.crucible');
  }
  home = resolve(home);

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }

  if (opts.persist === true && opts.home !== undefined) {
    writeHomeToConfig(home, osConfigPath);
  }

  return home;
}

// ---------------------------------------------------------------------------
// Home layout
// ---------------------------------------------------------------------------

export function defaultConfigPath(home: string): string {
  return join(home, 'config.json');
}

export function locksDir(home: string): string {
  return join(home, 'locks');
}
