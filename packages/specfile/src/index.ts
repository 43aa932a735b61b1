/**
 * @crucible/specfile
 *
 * Text-level processing of the package recipe: section extraction,
 * `%attr` directive parsing, version derivation and script synthesis.
 *
 * This package is the base layer of the workspace. It has no internal
 * Crucible dependencies and performs no I/O.
 */

// Types
export type {
  AttrDirective,
  AttrParseResult,
  ExtractorAction,
  ExtractorInput,
  ExtractorState,
  LineClass,
  MalformedAttr,
  RenderedSpec,
  RenderOptions,
  SpecEditId,
  SynthesisOptions,
  SynthesizedScripts,
  VersionDescriptor,
} from './types.js';

export { VersionFormatError } from './types.js';

// Functions
export { classifyLine, extractSection, extractSections, splitLines, TRANSITIONS } from './sections.js';
export { parseAttrDirectives, parseAttrLine, renderAttrCommands } from './attrs.js';
export { parseDescribe } from './version.js';
export { isPackageInstallStep, tokenizeShellLine } from './install-steps.js';
export {
  extractInstallSection,
  extractPreInstall,
  installCommand,
  renderWorkingSpec,
  SPEC_EDITS,
  synthesizeScripts,
} from './synthesizer.js';
