/**
 * Crucible CLI — Command Tests
 *
 *   CMD-U1: the program registers every command
 *   CMD-U2: anonymous builds get a vendor-release-timestamp directory
 *   CMD-U3: a registered build contributes its flags
 *   CMD-U4: a registered build for another release is rejected
 *   CMD-U5: build names are validated
 *   CMD-U6: clearing output needs the build step
 *   CMD-U7: clearing output is confirmed, or needs --yes off a terminal
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@crucible/kernel';
import type { BuildRecord } from '@crucible/runtime-host';
import { program } from '../src/commands/index.js';
import {
  cleanupQuestions,
  confirmCleanup,
  resolveBuildRequest,
  type BuildOptions,
} from '../src/commands/build.js';

const NOW = new Date('2026-03-04T05:06:07.000Z');

const DEFAULTS: BuildOptions = {
  skipBuild: false,
  skipContainer: false,
  incremental: false,
  withDebug: false,
  withTests: false,
  withFreshBuild: false,
  nukeInstall: false,
  yes: false,
};

const RECORD: BuildRecord = {
  name: 'wip',
  vendor: 'opensuse',
  release: 'leap-15.2',
  sourceDir: '/src/ceph',
  withDebug: false,
  withTests: true,
  createdAt: '2026-03-01T00:00:00.000Z',
};

describe('CMD-U1: program', () => {
  it('registers the commands', () => {
    expect(program.name()).toBe('crucible');
    expect(program.commands.map((command) => command.name()).sort()).toEqual([
      'build',
      'builds',
      'create',
      'destroy',
      'image-build',
      'images',
      'init',
      'shell',
    ]);
  });

  it('build takes vendor, release and source', () => {
    const build = program.commands.find((command) => command.name() === 'build');
    expect(build?.registeredArguments.map((argument) => argument.name())).toEqual(['vendor', 'release', 'source']);
    expect(build?.options.map((option) => option.long)).toEqual(
      expect.arrayContaining(['--skip-container', '--with-fresh-build', '--nuke-install', '--yes']),
    );
  });
});

describe('resolveBuildRequest', () => {
  it('CMD-U2: anonymous build', () => {
    expect(resolveBuildRequest('opensuse', 'leap-15.2', '/src/ceph', DEFAULTS, undefined, NOW)).toEqual({
      vendor: 'opensuse',
      release: 'leap-15.2',
      sourceDir: '/src/ceph',
      dirName: 'opensuse-leap-15.2_20260304T050607Z',
      buildName: undefined,
      withDebug: false,
      withTests: false,
      freshBuild: false,
      nukeInstall: false,
    });
  });

  it('CMD-U3: named build keeps the registered flags', () => {
    const request = resolveBuildRequest(
      'opensuse',
      'leap-15.2',
      '/src/ceph',
      { ...DEFAULTS, buildname: 'wip', withDebug: true },
      RECORD,
      NOW,
    );
    expect(request.dirName).toBe('wip');
    expect(request.buildName).toBe('wip');
    expect(request.withDebug).toBe(true);
    expect(request.withTests).toBe(true);
  });

  it('CMD-U4: rejects a record for another release', () => {
    expect(() =>
      resolveBuildRequest('opensuse', 'leap-15.3', '/src/ceph', { ...DEFAULTS, buildname: 'wip' }, RECORD, NOW),
    ).toThrow("build 'wip' is registered for opensuse/leap-15.2, not opensuse/leap-15.3");
  });

  it('CMD-U5: rejects an invalid build name', () => {
    expect(() =>
      resolveBuildRequest('opensuse', 'leap-15.2', '/src', { ...DEFAULTS, buildname: 'My Build' }, undefined, NOW),
    ).toThrow(ConfigurationError);
  });
});

describe('clearing build output', () => {
  const request = (options: Partial<BuildOptions>) =>
    resolveBuildRequest('opensuse', 'leap-15.2', '/src/ceph', { ...DEFAULTS, buildname: 'wip', ...options }, RECORD, NOW);

  it('CMD-U6: rejects --with-fresh-build or --nuke-install with --skip-build', () => {
    const message = '--with-fresh-build and --nuke-install need the build step; drop --skip-build';
    expect(() => request({ skipBuild: true, withFreshBuild: true })).toThrow(message);
    expect(() => request({ skipBuild: true, nukeInstall: true })).toThrow(message);
  });

  it('CMD-U7: asks one question per deletion, install directory first', () => {
    expect(cleanupQuestions(request({}))).toEqual([]);
    expect(cleanupQuestions(request({ withFreshBuild: true, nukeInstall: true }))).toEqual([
      'Are you sure you want to remove the install directory?',
      'Are you sure you want to run a fresh build?',
    ]);
  });

  it('CMD-U7: proceeds only when every question is confirmed', async () => {
    const asked: string[] = [];
    const answers = [true, false];
    const deps = {
      interactive: true,
      confirm: async (question: string) => {
        asked.push(question);
        return answers[asked.length - 1] === true;
      },
    };

    await expect(confirmCleanup(request({ withFreshBuild: true, nukeInstall: true }), false, deps)).resolves.toBe(false);
    expect(asked).toHaveLength(2);
  });

  it('CMD-U7: --yes skips the questions; off a terminal it is required', async () => {
    const never = {
      interactive: false,
      confirm: async (): Promise<boolean> => {
        throw new Error('unexpected prompt');
      },
    };
    const nuke = request({ nukeInstall: true });

    await expect(confirmCleanup(nuke, true, never)).resolves.toBe(true);
    await expect(confirmCleanup(request({}), false, never)).resolves.toBe(true);
    await expect(confirmCleanup(nuke, false, never)).rejects.toThrow(
      'refusing to delete build output without --yes when not on a terminal',
    );
  });
});
