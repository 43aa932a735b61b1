/**
 * Crucible Specfile — Script Synthesizer
 *
 * Two passes:
 *
 *   1. renderWorkingSpec() turns the recipe template into a working spec:
 *      `@PLACEHOLDER@` substitution plus a fixed list of structural edits
 *      (SPEC_EDITS). The working spec still contains macros; the build
 *      driver has them expanded by the external spec processor.
 *
 *   2. synthesizeScripts() takes the macro-resolved spec and produces the
 *      build, install, install-section and post-install scripts.
 *
 * A placeholder or edit whose target is not found is skipped silently.
 * Nothing here performs I/O.
 */

import { parseAttrDirectives, renderAttrCommands } from './attrs.js';
import { isPackageInstallStep } from './install-steps.js';
import { extractSection, splitLines } from './sections.js';
import type {
  RenderedSpec,
  RenderOptions,
  SpecEditId,
  SynthesisOptions,
  SynthesizedScripts,
  VersionDescriptor,
} from './types.js';

// ---------------------------------------------------------------------------
// Working spec rendering
// ---------------------------------------------------------------------------

interface SpecEdit {
  readonly id: SpecEditId;
  apply(text: string, options: RenderOptions): string;
}

const BUILD_BANNER = 'echo "===> BUILD <==="';
const INSTALL_BANNER = 'echo "==> INSTALL <=="';

/**
 * Structural edits, applied in order after placeholder substitution.
 *
 * `drop-fdupes` must run before `buildroot-path`: it matches the
 * unexpanded `%{buildroot}` macro.
 */
export const SPEC_EDITS: ReadonlyArray<SpecEdit> = [
  {
    // Builds run in place and may be repeated against the same tree.
    id: 'idempotent-build-dir',
    apply: (text) => text.replace(/\bmkdir build(?![\w-])(?!\s*\|\|\s*true)/g, 'mkdir build || true'),
  },
  {
    // Hardlink deduplication of the buildroot; nothing to deduplicate here.
    id: 'drop-fdupes',
    apply: (text) => text.replace(/%fdupes\s+%\{buildroot\}%\{_prefix\}/g, ''),
  },
  {
    id: 'buildroot-path',
    apply: (text, options) => text.split('%{buildroot}').join(options.installRoot),
  },
  {
    id: 'section-banners',
    apply: (text) => {
      let out = text;
      if (!out.includes(BUILD_BANNER)) {
        out = out.replace(/^%build[ \t]*$/gm, `%build\n${BUILD_BANNER}`);
      }
      if (!out.includes(INSTALL_BANNER)) {
        out = out.replace(/^%install[ \t]*$/gm, `%install\n${INSTALL_BANNER}`);
      }
      return out;
    },
  },
];

/**
 * Substitute version placeholders and apply SPEC_EDITS to a recipe template.
 */
export function renderWorkingSpec(
  template: string,
  version: VersionDescriptor,
  options: RenderOptions,
): RenderedSpec {
  const placeholders: ReadonlyArray<readonly [string, string]> = [
    ['@PROJECT_VERSION@', version.rpmVersion],
    ['@RPM_RELEASE@', version.rpmRelease],
    ['@TARBALL_BASENAME@', `${options.projectName}-${version.version}`],
  ];

  const applied: string[] = [];
  let text = template;

  for (const [token, value] of placeholders) {
    if (text.includes(token)) {
      text = text.split(token).join(value);
      applied.push(token);
    }
  }

  for (const edit of SPEC_EDITS) {
    const next = edit.apply(text, options);
    if (next !== text) {
      applied.push(edit.id);
      text = next;
    }
  }

  return { text, applied };
}

// ---------------------------------------------------------------------------
// Script synthesis
// ---------------------------------------------------------------------------

const SHEBANG = '#!/bin/bash';
const EXIT_LINE = /^exit(\s|;|$)/;

function script(lines: ReadonlyArray<string>): string {
  return lines.join('\n') + '\n';
}

/** The `%pre` bodies of all subpackages, without their `exit` lines. */
export function extractPreInstall(lines: ReadonlyArray<string>): string[] {
  return extractSection(lines, 'pre').filter((line) => !EXIT_LINE.test(line));
}

/**
 * The `%install` body without the packaging tool's own install invocation.
 */
export function extractInstallSection(lines: ReadonlyArray<string>): string[] {
  return extractSection(lines, 'install').filter((line) => !isPackageInstallStep(line));
}

/** The install command run by the build driver in place of the spec's. */
export function installCommand(installRoot: string, stripped: boolean): string {
  return `make DESTDIR=${installRoot} ${stripped ? 'install/strip' : 'install'}`;
}

/**
 * Produce every script of a build from a macro-resolved spec.
 */
export function synthesizeScripts(
  resolvedSpec: string,
  options: SynthesisOptions,
): SynthesizedScripts {
  const lines = splitLines(resolvedSpec);
  const { directives, malformed } = parseAttrDirectives(lines);

  const buildScript = script([
    SHEBANG,
    'set -e',
    `cd ${options.sourceRoot}`,
    '',
    ...extractSection(lines, 'build'),
  ]);

  const installScript = script([
    SHEBANG,
    'set -e',
    `cd ${options.sourceRoot}/${options.buildSubdir}`,
    installCommand(options.installRoot, options.stripped),
  ]);

  const installSectionScript = script([
    SHEBANG,
    'set -e',
    `cd ${options.sourceRoot}`,
    '',
    ...extractInstallSection(lines),
  ]);

  const postInstallScript = script([
    SHEBANG,
    '',
    'echo "run post-install requirements for image"',
    '',
    ...extractPreInstall(lines),
    ...directives.flatMap(renderAttrCommands),
  ]);

  return {
    buildScript,
    installScript,
    installSectionScript,
    postInstallScript,
    malformedAttrs: malformed,
  };
}
