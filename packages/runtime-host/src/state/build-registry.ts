/**
 * Crucible Runtime Host — Build Registry
 *
 * Named builds persisted at `<home>/state/builds.json`. A record remembers
 * what `crucible create` was given so later commands need only the name.
 *
 * Build names double as image repository components
 * (`<namespace>-builds/<name>`), so they follow the same character rules as
 * vendor and release.
 *
 * Records that do not have the expected shape are ignored on read.
 */

import { ConfigurationError, assertImageComponent } from '@crucible/kernel';
import type { StateIO } from './state-io.js';

export const BUILDS_FILE = 'builds.json';

export interface BuildRecord {
  readonly name: string;
  readonly vendor: string;
  readonly release: string;
  readonly sourceDir: string;
  readonly withDebug: boolean;
  readonly withTests: boolean;
  /** ISO 8601 creation timestamp. */
  readonly createdAt: string;
}

interface BuildIndex {
  readonly builds: ReadonlyArray<BuildRecord>;
}

export class BuildRegistry {
  constructor(private readonly stateIO: StateIO) {}

  list(): ReadonlyArray<BuildRecord> {
    return this.read().builds;
  }

  get(name: string): BuildRecord | undefined {
    return this.read().builds.find((record) => record.name === name);
  }

  /** Look up a build, failing with a ConfigurationError when it is unknown. */
  require(name: string): BuildRecord {
    const record = this.get(name);
    if (record === undefined) {
      throw new ConfigurationError(`build '${name}' does not exist`);
    }
    return record;
  }

  /**
   * @throws {ConfigurationError} If the name is invalid or already registered
   */
  add(record: BuildRecord): void {
    assertImageComponent('build name', record.name);
    const { builds } = this.read();
    if (builds.some((existing) => existing.name === record.name)) {
      throw new ConfigurationError(`build '${record.name}' already exists`);
    }
    this.write({ builds: [...builds, record] });
  }

  /** @returns Whether a record was removed */
  remove(name: string): boolean {
    const { builds } = this.read();
    const remaining = builds.filter((record) => record.name !== name);
    if (remaining.length === builds.length) return false;
    this.write({ builds: remaining });
    return true;
  }

  private read(): BuildIndex {
    const raw = this.stateIO.readJson(BUILDS_FILE);
    if (typeof raw !== 'object' || raw === null) return { builds: [] };
    const builds: unknown = Reflect.get(raw, 'builds');
    if (!Array.isArray(builds)) return { builds: [] };
    const entries: ReadonlyArray<unknown> = builds;
    return { builds: entries.filter(isBuildRecord) };
  }

  private write(index: BuildIndex): void {
    this.stateIO.writeJson(BUILDS_FILE, index);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isBuildRecord(value: unknown): value is BuildRecord {
  if (typeof value !== 'object' || value === null) return false;
  const str = (key: string): boolean => typeof Reflect.get(value, key) === 'string';
  const bool = (key: string): boolean => typeof Reflect.get(value, key) === 'boolean';
  return (
    str('name') &&
    str('vendor') &&
    str('release') &&
    str('sourceDir') &&
    bool('withDebug') &&
    bool('withTests') &&
    str('createdAt')
  );
}
