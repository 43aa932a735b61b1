/**
 * Crucible Kernel — Build Driver Tests
 *
 *   DRV-U1: steps run in order; scripts run in the builder container
 *   DRV-U2: no debug, no tests: stripped install and -DWITH_TESTS=OFF
 *   DRV-U3: debug, tests and a compiler cache
 *   DRV-U4: admissibility failures name the step and run nothing
 *   DRV-U5: toolkit stamp binds a layout to one build
 *   DRV-U6: a failing container step stops the pipeline
 *   DRV-U7: post-install script and malformed %attr reporting
 *   DRV-U8: fresh build and install-tree removal before building
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BuildDriver } from '../src/build/driver.js';
import { BuildLogger } from '../src/logging/build-log.js';
import { BUILD_STEPS, type BuildJob } from '../src/types/job.js';
import { BuildStepError, SpecNotFoundError } from '../src/errors.js';
import { jobFingerprint } from '../src/build/stamp.js';
import {
  CapturingSink,
  FakeImageStore,
  FakeVersionControl,
  IdentitySpecResolver,
  MemoryWorkspaceFs,
  RecordingRunner,
} from './fakes.js';

const NAMING = { namespace: 'crucible', seedTag: 'leap-15.2' };
const BUILDER = 'crucible/builder/suse:pacific';

const TEMPLATE = [
  'Name: ceph',
  'Version: @PROJECT_VERSION@',
  'Release: @RPM_RELEASE@',
  '%build',
  'mkdir build',
  'cd build',
  'cmake .. $CEPH_EXTRA_CMAKE_ARGS',
  '%install',
  'pushd build',
  'make DESTDIR=%{buildroot} install',
  'popd',
  '%pre',
  'groupadd -r ceph',
  'exit 0',
  '%files',
  '%attr(750,ceph,ceph) %dir /var/lib/ceph',
  '%attr(bad) /x',
].join('\n');

const JOB: BuildJob = {
  vendor: 'suse',
  release: 'pacific',
  sourceDir: '/src/ceph',
  outputDir: '/builds/wip/install',
  toolkitDir: '/builds/wip/toolkit',
  cacheDir: null,
  withDebug: false,
  withTests: false,
  freshBuild: false,
  nukeInstall: false,
};

interface Harness {
  fs: MemoryWorkspaceFs;
  store: FakeImageStore;
  vcs: FakeVersionControl;
  runner: RecordingRunner;
  resolver: IdentitySpecResolver;
  sink: CapturingSink;
  driver: BuildDriver;
}

function makeHarness(): Harness {
  const fs = new MemoryWorkspaceFs();
  fs.dirs.add('/src/ceph');
  fs.files.set('/src/ceph/ceph.spec.in', { content: TEMPLATE, mode: undefined });
  const store = new FakeImageStore([BUILDER]);
  const vcs = new FakeVersionControl();
  const runner = new RecordingRunner();
  const resolver = new IdentitySpecResolver(fs);
  const sink = new CapturingSink();
  const driver = new BuildDriver({
    fs,
    store,
    vcs,
    resolver,
    runner,
    naming: NAMING,
    projectName: 'ceph',
    recipeFile: 'ceph.spec.in',
    logger: new BuildLogger(sink),
  });
  return { fs, store, vcs, runner, resolver, sink, driver };
}

let h: Harness;

beforeEach(() => {
  h = makeHarness();
});

// ---------------------------------------------------------------------------
// DRV-U1 .. U3
// ---------------------------------------------------------------------------

describe('DRV-U1: pipeline', () => {
  it('runs every step in order', async () => {
    await h.driver.run(JOB);
    const completed = h.sink.events.filter((e) => e.kind === 'step.completed').map((e) => e.step);
    expect(completed).toEqual([...BUILD_STEPS]);
  });

  it('runs build, install and install-section scripts in the builder image', async () => {
    await h.driver.run(JOB);
    expect(h.runner.runs.map((r) => `${r.image} ${r.script}`)).toEqual([
      `${BUILDER} /build/bin/build.sh`,
      `${BUILDER} /build/bin/install.sh`,
      `${BUILDER} /build/bin/install-section.sh`,
    ]);
  });

  it('derives the version and prepares submodules', async () => {
    const result = await h.driver.run(JOB);
    expect(result.version).toEqual({
      version: '16.2.0-123-gabc1234',
      rpmVersion: '16.2.0',
      rpmRelease: '123.gabc1234',
    });
    expect(h.vcs.prepared).toEqual(['/src/ceph']);
  });

  it('resolves the rendered working spec inside the builder image', async () => {
    await h.driver.run(JOB);
    expect(h.resolver.calls).toEqual([{ specFile: '/builds/wip/toolkit/ceph.spec', image: BUILDER }]);
    expect(h.fs.text('/builds/wip/toolkit/ceph.spec')?.split('\n').slice(1, 3)).toEqual([
      'Version: 16.2.0',
      'Release: 123.gabc1234',
    ]);
  });

  it('writes scripts executable', async () => {
    const result = await h.driver.run(JOB);
    expect(h.fs.files.get(result.scripts.build)?.mode).toBe(0o755);
    expect(h.fs.files.get(result.scripts.postInstall)?.mode).toBe(0o755);
  });
});

describe('DRV-U2: release build without debug info or tests', () => {
  it('requests the stripped install target', async () => {
    await h.driver.run(JOB);
    expect(h.fs.text('/builds/wip/toolkit/install.sh')).toBe(
      '#!/bin/bash\nset -e\ncd /build/src/build\nmake DESTDIR=/build/out install/strip\n',
    );
  });

  it('disables test compilation and mounts no compiler cache', async () => {
    await h.driver.run(JOB);
    const first = h.runner.runs[0];
    expect(first?.env).toEqual({ CEPH_EXTRA_CMAKE_ARGS: '-DWITH_TESTS=OFF' });
    expect(first?.mounts).toEqual([
      { host: '/src/ceph', container: '/build/src' },
      { host: '/builds/wip/install', container: '/build/out' },
      { host: '/builds/wip/toolkit', container: '/build/bin' },
    ]);
  });
});

describe('DRV-U3: debug build with tests and a compiler cache', () => {
  const job: BuildJob = { ...JOB, withDebug: true, withTests: true, cacheDir: '/cache/suse/pacific' };

  it('uses the full install target and enables ccache', async () => {
    h.fs.dirs.add('/cache/suse/pacific');
    await h.driver.run(job);

    expect(h.fs.text('/builds/wip/toolkit/install.sh')).toBe(
      '#!/bin/bash\nset -e\ncd /build/src/build\nmake DESTDIR=/build/out install\n',
    );
    const first = h.runner.runs[0];
    expect(first?.env).toEqual({
      CEPH_EXTRA_CMAKE_ARGS: '-DWITH_CCACHE=ON',
      CCACHE_DIR: '/build/ccache',
      CCACHE_BASEDIR: '/build/src',
    });
    expect(first?.mounts.at(-1)).toEqual({ host: '/cache/suse/pacific', container: '/build/ccache' });
  });
});

// ---------------------------------------------------------------------------
// DRV-U4 .. U6
// ---------------------------------------------------------------------------

describe('DRV-U4: admissibility', () => {
  it('a missing recipe file fails before anything runs', async () => {
    h.fs.files.delete('/src/ceph/ceph.spec.in');

    const err = await h.driver.run(JOB).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BuildStepError);
    expect(err).toMatchObject({ step: 'admissibility', kind: 'configuration' });
    expect(err instanceof BuildStepError && err.cause instanceof SpecNotFoundError).toBe(true);
    expect(h.runner.runs).toEqual([]);
    expect(h.fs.dirs.has('/builds/wip/install')).toBe(false);
  });

  it('a missing builder image is reported', async () => {
    h.store.images.clear();
    await expect(h.driver.run(JOB)).rejects.toThrow(
      "build step 'admissibility' failed: builder image crucible/builder/suse:pacific not found; run image-build first",
    );
  });

  it('an output path that is a file is rejected', async () => {
    h.fs.files.set('/builds/wip/install', { content: '', mode: undefined });
    await expect(h.driver.run(JOB)).rejects.toMatchObject({ step: 'layout' });
  });
});

describe('DRV-U5: toolkit stamp', () => {
  it('writes a stamp on first use and accepts a rerun of the same job', async () => {
    await h.driver.run(JOB);
    const stamp = h.fs.text('/builds/wip/toolkit/job.json');
    expect(stamp).toBe(
      JSON.stringify(
        { vendor: 'suse', release: 'pacific', sourceDir: '/src/ceph', fingerprint: jobFingerprint(JOB) },
        null,
        2,
      ) + '\n',
    );

    await expect(h.driver.run({ ...JOB, withDebug: true })).resolves.toMatchObject({
      builderImage: BUILDER,
    });
  });

  it('refuses a toolkit stamped by another build', async () => {
    await h.driver.run(JOB);
    h.store.images.add('crucible/builder/suse:quincy');

    await expect(h.driver.run({ ...JOB, release: 'quincy' })).rejects.toThrow(
      "build step 'layout' failed: toolkit /builds/wip/toolkit belongs to suse/pacific from /src/ceph, " +
        'not suse/quincy from /src/ceph',
    );
  });

  it('tolerates an output directory left by a previous build', async () => {
    h.fs.dirs.add('/builds/wip/install');
    h.fs.files.set('/builds/wip/install/usr/bin/ceph', { content: 'old', mode: 0o755 });

    await h.driver.run(JOB);
    expect(h.fs.text('/builds/wip/install/usr/bin/ceph')).toBe('old');
  });
});

describe('DRV-U6: container step failure', () => {
  it('stops at the failing step', async () => {
    h.runner.failOn = '/build/bin/build.sh';

    const err = await h.driver.run(JOB).catch((e: unknown) => e);

    expect(err).toMatchObject({ step: 'build', kind: 'external-tool' });
    expect(h.runner.runs).toHaveLength(1);
    expect(h.sink.events.at(-1)).toMatchObject({ kind: 'step.failed', step: 'build' });
  });
});

// ---------------------------------------------------------------------------
// DRV-U7
// ---------------------------------------------------------------------------

describe('DRV-U7: post-install script', () => {
  it('lands at the root of the install tree', async () => {
    await h.driver.run(JOB);
    expect(h.fs.text('/builds/wip/install/post-install.sh')).toBe(
      [
        '#!/bin/bash',
        '',
        'echo "run post-install requirements for image"',
        '',
        'groupadd -r ceph',
        'chmod 750 /var/lib/ceph',
        'chown ceph:ceph /var/lib/ceph',
        '',
      ].join('\n'),
    );
  });

  it('reports malformed %attr lines without failing', async () => {
    const result = await h.driver.run(JOB);
    expect(result.malformedAttrs).toHaveLength(1);
    expect(h.sink.events.filter((e) => e.kind === 'attr.malformed').map((e) => e.detail)).toEqual([
      'line 19: expected 3 attribute fields, found 1: %attr(bad) /x',
    ]);
  });

  it('the install-section script keeps everything but the install invocation', async () => {
    await h.driver.run(JOB);
    expect(h.fs.text('/builds/wip/toolkit/install-section.sh')).toBe(
      '#!/bin/bash\nset -e\ncd /build/src\n\necho "==> INSTALL <=="\npushd build\npopd\n',
    );
  });
});

// ---------------------------------------------------------------------------
// DRV-U8
// ---------------------------------------------------------------------------

describe('DRV-U8: clearing previous output', () => {
  beforeEach(() => {
    h.fs.dirs.add('/src/ceph/build');
    h.fs.files.set('/src/ceph/build/CMakeCache.txt', { content: 'cache', mode: undefined });
    h.fs.dirs.add('/builds/wip/install');
    h.fs.files.set('/builds/wip/install/usr/bin/ceph', { content: 'old', mode: 0o755 });
  });

  it('keeps both trees by default', async () => {
    await h.driver.run(JOB);
    expect(h.fs.text('/src/ceph/build/CMakeCache.txt')).toBe('cache');
    expect(h.fs.text('/builds/wip/install/usr/bin/ceph')).toBe('old');
    expect(h.sink.events.some((e) => e.kind === 'layout.cleared')).toBe(false);
  });

  it('freshBuild removes the build directory of the source tree only', async () => {
    await h.driver.run({ ...JOB, freshBuild: true });

    expect(h.fs.files.has('/src/ceph/build/CMakeCache.txt')).toBe(false);
    expect(h.fs.dirs.has('/src/ceph/build')).toBe(false);
    expect(h.fs.text('/src/ceph/ceph.spec.in')).toBe(TEMPLATE);
    expect(h.fs.text('/builds/wip/install/usr/bin/ceph')).toBe('old');
    expect(h.sink.events.filter((e) => e.kind === 'layout.cleared').map((e) => e.detail)).toEqual([
      '/src/ceph/build',
    ]);
  });

  it('nukeInstall empties the install tree before the build runs', async () => {
    await h.driver.run({ ...JOB, nukeInstall: true });

    expect(h.fs.files.has('/builds/wip/install/usr/bin/ceph')).toBe(false);
    expect(h.fs.dirs.has('/builds/wip/install')).toBe(true);
    expect(h.fs.text('/builds/wip/install/post-install.sh')).toContain('groupadd -r ceph');
    expect(h.fs.text('/src/ceph/build/CMakeCache.txt')).toBe('cache');
  });

  it('a missing build directory is not an error', async () => {
    h.fs.files.delete('/src/ceph/build/CMakeCache.txt');
    h.fs.dirs.delete('/src/ceph/build');

    await h.driver.run({ ...JOB, freshBuild: true });
    expect(h.sink.events.some((e) => e.kind === 'layout.cleared')).toBe(false);
  });

  it('a build path that is a file fails the layout step', async () => {
    h.fs.files.delete('/src/ceph/build/CMakeCache.txt');
    h.fs.dirs.delete('/src/ceph/build');
    h.fs.files.set('/src/ceph/build', { content: '', mode: undefined });

    await expect(h.driver.run({ ...JOB, freshBuild: true })).rejects.toThrow(
      "build step 'layout' failed: build path exists and is not a directory: /src/ceph/build",
    );
    expect(h.runner.runs).toEqual([]);
  });
});
