/**
 * Crucible Specfile — Core Type Definitions
 *
 * Types shared by the section extractor, the attribute directive parser and
 * the script synthesizer. This package has no internal Crucible dependencies
 * and performs no I/O: every function takes text and returns text.
 */

// ---------------------------------------------------------------------------
// Section extraction
// ---------------------------------------------------------------------------

/**
 * Classification of a single spec document line.
 *
 * A line is a marker iff it matches `^%<identifier>` at column 0. The marker
 * name is the identifier without the leading `%` (`%pre -n foo` → `pre`,
 * `%attr(644,-,-) /x` → `attr`). Every other line is opaque content.
 */
export type LineClass =
  | { readonly kind: 'marker'; readonly name: string }
  | { readonly kind: 'content' };

/**
 * States of the section extraction state machine.
 *
 * - `outside`        before the first marker of the document
 * - `inside-target`  within a section whose name equals the requested one
 * - `inside-other`   within any other section
 */
export type ExtractorState = 'outside' | 'inside-target' | 'inside-other';

/**
 * Input symbols of the state machine: a marker for the requested section,
 * a marker for any other section, or a content line.
 */
export type ExtractorInput = 'target-marker' | 'other-marker' | 'content';

/** What the extractor does with the current line after a transition. */
export type ExtractorAction = 'emit' | 'skip';

// ---------------------------------------------------------------------------
// Attribute directives
// ---------------------------------------------------------------------------

/**
 * A parsed `%attr(mode,user,group) path` directive.
 *
 * `-` in any position means "unchanged". `qualifier` holds the tokens between
 * the attribute list and the path when present (e.g. `%dir`,
 * `%config(noreplace)`, `%ghost %dir`), joined by single spaces.
 */
export interface AttrDirective {
  readonly mode: string;
  readonly user: string;
  readonly group: string;
  readonly path: string;
  readonly qualifier: string | null;
  /** 1-based line number within the scanned document. */
  readonly line: number;
}

/** A `%attr` line that could not be parsed. */
export interface MalformedAttr {
  readonly line: number;
  readonly text: string;
  readonly reason: string;
}

export type AttrParseResult =
  | { readonly kind: 'ok'; readonly directive: AttrDirective }
  | { readonly kind: 'malformed'; readonly reason: string }
  | { readonly kind: 'not-attr' };

// ---------------------------------------------------------------------------
// Versioning
// ---------------------------------------------------------------------------

/**
 * Version descriptor derived from `git describe --long --match 'v*'`.
 *
 * For `v16.2.0-123-gabc1234`:
 *   version    = '16.2.0-123-gabc1234'
 *   rpmVersion = '16.2.0'
 *   rpmRelease = '123.gabc1234'
 */
export interface VersionDescriptor {
  readonly version: string;
  readonly rpmVersion: string;
  readonly rpmRelease: string;
}

// ---------------------------------------------------------------------------
// Synthesis
// ---------------------------------------------------------------------------

/** Identifier of a structural edit applied to the spec template. */
export type SpecEditId =
  | 'idempotent-build-dir'
  | 'drop-fdupes'
  | 'buildroot-path'
  | 'section-banners';

/** Options for rendering the working spec from its template. */
export interface RenderOptions {
  /** Project name used in the archive basename (`<projectName>-<version>`). */
  readonly projectName: string;
  /** Install root as seen from inside the build environment. */
  readonly installRoot: string;
}

/** Result of rendering the working spec. */
export interface RenderedSpec {
  readonly text: string;
  /** Placeholders and edits that matched at least once, in application order. */
  readonly applied: ReadonlyArray<string>;
}

/** Options for synthesizing scripts from a macro-resolved spec. */
export interface SynthesisOptions {
  /** Source tree root inside the build environment (e.g. /build/src). */
  readonly sourceRoot: string;
  /** Install root inside the build environment (e.g. /build/out). */
  readonly installRoot: string;
  /** Compiled tree, relative to sourceRoot, that carries the install targets. */
  readonly buildSubdir: string;
  /** Use the stripped install target (debug symbols not requested). */
  readonly stripped: boolean;
}

/** All artifacts produced by the synthesizer for one build. */
export interface SynthesizedScripts {
  readonly buildScript: string;
  readonly installScript: string;
  readonly installSectionScript: string;
  readonly postInstallScript: string;
  /** `%attr` lines that were skipped, for diagnostics. */
  readonly malformedAttrs: ReadonlyArray<MalformedAttr>;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Raised when `git describe` output has no `<commits>-<hash>` suffix. */
export class VersionFormatError extends Error {
  constructor(readonly input: string) {
    super(`Unrecognized describe output: ${JSON.stringify(input)} (expected <tag>-<commits>-<hash>)`);
    this.name = 'VersionFormatError';
  }
}
