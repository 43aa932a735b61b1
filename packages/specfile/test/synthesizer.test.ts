/**
 * Crucible Specfile — Script Synthesizer Tests
 *
 *   SYN-U1: placeholder substitution and structural edits
 *   SYN-U2: rendering is idempotent; missing targets are silent
 *   SYN-U3: build, install and install-section scripts
 *   SYN-U4: post-install script (%pre bodies + %attr fix-ups)
 */

import { describe, it, expect } from 'vitest';
import { installCommand, renderWorkingSpec, synthesizeScripts } from '../src/synthesizer.js';
import type { RenderOptions, SynthesisOptions, VersionDescriptor } from '../src/types.js';

const VERSION: VersionDescriptor = {
  version: '16.2.0-123-gabc1234',
  rpmVersion: '16.2.0',
  rpmRelease: '123.gabc1234',
};

const RENDER: RenderOptions = { projectName: 'ceph', installRoot: '/build/out' };

const TEMPLATE = [
  'Name: ceph',
  'Version: @PROJECT_VERSION@',
  'Release: @RPM_RELEASE@%{?dist}',
  'Source0: %{?_remote_tarball_prefix}@TARBALL_BASENAME@.tar.bz2',
  '%build',
  'mkdir build',
  'cd build',
  '%install',
  'pushd build',
  'make DESTDIR=%{buildroot} install',
  'popd',
  '%fdupes %{buildroot}%{_prefix}',
].join('\n');

// ---------------------------------------------------------------------------
// SYN-U1
// ---------------------------------------------------------------------------

describe('SYN-U1: renderWorkingSpec', () => {
  it('substitutes placeholders and applies every edit', () => {
    const rendered = renderWorkingSpec(TEMPLATE, VERSION, RENDER);

    expect(rendered.text).toBe([
      'Name: ceph',
      'Version: 16.2.0',
      'Release: 123.gabc1234%{?dist}',
      'Source0: %{?_remote_tarball_prefix}ceph-16.2.0-123-gabc1234.tar.bz2',
      '%build',
      'echo "===> BUILD <==="',
      'mkdir build || true',
      'cd build',
      '%install',
      'echo "==> INSTALL <=="',
      'pushd build',
      'make DESTDIR=/build/out install',
      'popd',
      '',
    ].join('\n'));

    expect(rendered.applied).toEqual([
      '@PROJECT_VERSION@',
      '@RPM_RELEASE@',
      '@TARBALL_BASENAME@',
      'idempotent-build-dir',
      'drop-fdupes',
      'buildroot-path',
      'section-banners',
    ]);
  });

  it('does not touch directories that merely start with "build"', () => {
    const rendered = renderWorkingSpec('mkdir build-doc\nmkdir builddir', VERSION, RENDER);
    expect(rendered.text).toBe('mkdir build-doc\nmkdir builddir');
  });
});

// ---------------------------------------------------------------------------
// SYN-U2
// ---------------------------------------------------------------------------

describe('SYN-U2: idempotence and leniency', () => {
  it('rendering a rendered spec changes nothing', () => {
    const once = renderWorkingSpec(TEMPLATE, VERSION, RENDER);
    const twice = renderWorkingSpec(once.text, VERSION, RENDER);
    expect(twice.text).toBe(once.text);
    expect(twice.applied).toEqual([]);
  });

  it('a template without placeholders renders unchanged', () => {
    expect(renderWorkingSpec('Name: other', VERSION, RENDER)).toEqual({ text: 'Name: other', applied: [] });
  });
});

// ---------------------------------------------------------------------------
// SYN-U3 / SYN-U4
// ---------------------------------------------------------------------------

const RESOLVED = [
  'Name: ceph',
  '%build',
  'echo "===> BUILD <==="',
  'mkdir build || true',
  'cd build',
  'cmake .. $CEPH_EXTRA_CMAKE_ARGS',
  'make -j8',
  '%install',
  'echo "==> INSTALL <=="',
  'pushd build',
  'make DESTDIR=/build/out install',
  'popd',
  'install -m 0644 -D src/etc/ceph.conf /build/out/etc/ceph/ceph.conf',
  '%pre common',
  'CEPH_GROUP_ID=167',
  'groupadd -r -g $CEPH_GROUP_ID ceph',
  'exit 0',
  '%preun common',
  'exit 0',
  '%files common',
  '%attr(750,ceph,ceph) %dir /var/lib/ceph',
  '%attr(644,-,-) /etc/ceph/rbdmap',
  '%attr(bad) /x',
].join('\n');

const SYNTH: SynthesisOptions = {
  sourceRoot: '/build/src',
  installRoot: '/build/out',
  buildSubdir: 'build',
  stripped: true,
};

describe('SYN-U3: build and install scripts', () => {
  const scripts = synthesizeScripts(RESOLVED, SYNTH);

  it('emits the %build body verbatim after the prelude', () => {
    expect(scripts.buildScript).toBe([
      '#!/bin/bash',
      'set -e',
      'cd /build/src',
      '',
      'echo "===> BUILD <==="',
      'mkdir build || true',
      'cd build',
      'cmake .. $CEPH_EXTRA_CMAKE_ARGS',
      'make -j8',
      '',
    ].join('\n'));
  });

  it('uses the stripped install target when requested', () => {
    expect(scripts.installScript).toBe([
      '#!/bin/bash',
      'set -e',
      'cd /build/src/build',
      'make DESTDIR=/build/out install/strip',
      '',
    ].join('\n'));
  });

  it('uses the plain install target otherwise', () => {
    expect(installCommand('/build/out', false)).toBe('make DESTDIR=/build/out install');
  });

  it('drops the packaging tool install line from the %install body', () => {
    expect(scripts.installSectionScript).toBe([
      '#!/bin/bash',
      'set -e',
      'cd /build/src',
      '',
      'echo "==> INSTALL <=="',
      'pushd build',
      'popd',
      'install -m 0644 -D src/etc/ceph.conf /build/out/etc/ceph/ceph.conf',
      '',
    ].join('\n'));
  });
});

describe('SYN-U4: post-install script', () => {
  const scripts = synthesizeScripts(RESOLVED, SYNTH);

  it('contains the %pre bodies without exit lines, then the %attr fix-ups', () => {
    expect(scripts.postInstallScript).toBe([
      '#!/bin/bash',
      '',
      'echo "run post-install requirements for image"',
      '',
      'CEPH_GROUP_ID=167',
      'groupadd -r -g $CEPH_GROUP_ID ceph',
      'chmod 750 /var/lib/ceph',
      'chown ceph:ceph /var/lib/ceph',
      'chmod 644 /etc/ceph/rbdmap',
      '',
    ].join('\n'));
  });

  it('reports malformed %attr lines', () => {
    expect(scripts.malformedAttrs).toEqual([
      { line: 23, text: '%attr(bad) /x', reason: 'expected 3 attribute fields, found 1' },
    ]);
  });

  it('an empty document yields scripts with nothing to do', () => {
    const empty = synthesizeScripts('', SYNTH);
    expect(empty.postInstallScript).toBe(
      '#!/bin/bash\n\necho "run post-install requirements for image"\n\n',
    );
    expect(empty.malformedAttrs).toEqual([]);
  });
});
