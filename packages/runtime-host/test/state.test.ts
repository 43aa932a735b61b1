/**
 * Crucible Runtime Host — State, Registry and Event Log Tests
 *
 *   SIO-U1: FileStateIO JSON round trip under state/
 *   SIO-U2: absent or corrupt JSON reads as undefined
 *   SIO-U3: appendLine / readLogRaw for both implementations
 *   REG-U1: BuildRegistry add / get / list / remove
 *   REG-U2: duplicate and invalid names are rejected
 *   REG-U3: malformed records are ignored on read
 *   LOG-U1: FileLogSink writes one JSONL line per event with a ULID
 *
 * Isolation: MemoryStateIO, or FileStateIO over a temp directory.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BuildStage, ConfigurationError } from '@crucible/kernel';
import type { BuildEvent } from '@crucible/kernel';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import { BUILDS_FILE, BuildRegistry } from '../src/state/build-registry.js';
import type { BuildRecord } from '../src/state/build-registry.js';
import { EVENT_LOG, FileLogSink } from '../src/logging/file-log-sink.js';
import { ulid } from '../src/logging/ulid.js';

function homeDir(): string {
  return mkdtempSync(join(tmpdir(), 'crucible-state-'));
}

function record(name: string): BuildRecord {
  return {
    name,
    vendor: 'opensuse',
    release: 'leap-15.2',
    sourceDir: `/src/${name}`,
    withDebug: false,
    withTests: true,
    createdAt: '2026-03-01T00:00:00.000Z',
  };
}

// ---------------------------------------------------------------------------
// StateIO
// ---------------------------------------------------------------------------

describe('StateIO', () => {
  it('SIO-U1: FileStateIO writes JSON under state/', () => {
    const home = homeDir();
    const io = new FileStateIO(home);
    io.writeJson('x.json', { a: 1 });

    expect(JSON.parse(readFileSync(join(home, 'state', 'x.json'), 'utf-8'))).toEqual({ a: 1 });
    expect(io.readJson('x.json')).toEqual({ a: 1 });
  });

  it('SIO-U2: missing and corrupt files read as undefined', () => {
    const home = homeDir();
    const io = new FileStateIO(home);
    expect(io.readJson('absent.json')).toBeUndefined();

    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'bad.json'), '{');
    expect(io.readJson('bad.json')).toBeUndefined();

    expect(new MemoryStateIO().readJson('absent.json')).toBeUndefined();
  });

  it('SIO-U3: log lines end with a newline in both implementations', () => {
    const home = homeDir();
    const file = new FileStateIO(home);
    const memory = new MemoryStateIO();
    expect(file.readLogRaw('e.jsonl')).toBe('');
    expect(memory.readLogRaw('e.jsonl')).toBe('');

    for (const io of [file, memory]) {
      io.appendLine('e.jsonl', '{"n":1}');
      io.appendLine('e.jsonl', '{"n":2}');
      expect(io.readLogRaw('e.jsonl')).toBe('{"n":1}\n{"n":2}\n');
    }
    expect(readFileSync(join(home, 'logs', 'e.jsonl'), 'utf-8')).toBe('{"n":1}\n{"n":2}\n');
  });
});

// ---------------------------------------------------------------------------
// BuildRegistry
// ---------------------------------------------------------------------------

describe('BuildRegistry', () => {
  it('REG-U1: add, get, list and remove', () => {
    const registry = new BuildRegistry(new MemoryStateIO());
    registry.add(record('alpha'));
    registry.add(record('beta'));

    expect(registry.list().map((r) => r.name)).toEqual(['alpha', 'beta']);
    expect(registry.get('beta')).toEqual(record('beta'));
    expect(registry.get('gamma')).toBeUndefined();

    expect(registry.remove('alpha')).toBe(true);
    expect(registry.remove('alpha')).toBe(false);
    expect(registry.list().map((r) => r.name)).toEqual(['beta']);
  });

  it('REG-U2: rejects duplicates, invalid names and unknown lookups', () => {
    const registry = new BuildRegistry(new MemoryStateIO());
    registry.add(record('alpha'));

    expect(() => registry.add(record('alpha'))).toThrow("build 'alpha' already exists");
    expect(() => registry.add(record('Alpha'))).toThrow(ConfigurationError);
    expect(() => registry.require('nope')).toThrow("build 'nope' does not exist");
  });

  it('REG-U3: skips records of the wrong shape', () => {
    const io = new MemoryStateIO();
    io.writeJson(BUILDS_FILE, { builds: [record('ok'), { name: 'broken' }, 7] });

    expect(new BuildRegistry(io).list().map((r) => r.name)).toEqual(['ok']);
  });

  it('persists to builds.json through FileStateIO', () => {
    const home = homeDir();
    new BuildRegistry(new FileStateIO(home)).add(record('alpha'));

    expect(new BuildRegistry(new FileStateIO(home)).require('alpha').sourceDir).toBe('/src/alpha');
  });
});

// ---------------------------------------------------------------------------
// FileLogSink
// ---------------------------------------------------------------------------

describe('FileLogSink', () => {
  it('LOG-U1: one JSONL line per event, absent fields as null', () => {
    const io = new MemoryStateIO();
    const sink = new FileLogSink(io);
    const built: BuildEvent = {
      kind: 'stage.built',
      timestamp: '2026-03-01T00:00:00.000Z',
      vendor: 'opensuse',
      release: 'leap-15.2',
      stage: BuildStage.ReleaseBase,
      detail: 'crucible/base/opensuse:leap-15.2',
    };

    sink.append(built);
    sink.append({ ...built, kind: 'step.started', stage: undefined, step: 'build', detail: undefined });

    const lines = io.readLines(EVENT_LOG);
    expect(lines).toHaveLength(2);

    const first: unknown = JSON.parse(lines[0] ?? '');
    expect(first).toMatchObject({
      timestamp: '2026-03-01T00:00:00.000Z',
      kind: 'stage.built',
      stage: 'release-base',
      step: null,
      vendor: 'opensuse',
      release: 'leap-15.2',
      detail: 'crucible/base/opensuse:leap-15.2',
    });
    expect(first).toHaveProperty('event_id', expect.stringMatching(/^[0-9A-HJKMNP-TV-Z]{26}$/));

    const second: unknown = JSON.parse(lines[1] ?? '');
    expect(second).toMatchObject({ kind: 'step.started', stage: null, step: 'build', detail: null });
  });
});

describe('ulid', () => {
  it('encodes the timestamp in the first ten characters', () => {
    expect(ulid(0).slice(0, 10)).toBe('0000000000');
    expect(ulid(1).slice(0, 10)).toBe('0000000001');
    expect(ulid(32).slice(0, 10)).toBe('0000000010');
  });

  it('sorts by creation time', () => {
    expect(ulid(1_000) < ulid(2_000)).toBe(true);
  });
});
