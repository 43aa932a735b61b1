/**
 * Crucible Specfile — Section Extractor
 *
 * Splits a spec document into named section bodies. There is no grammar:
 * a line is a section boundary iff it starts at column 0 with `%` followed
 * by an identifier, and every other line is opaque content passed through
 * verbatim.
 *
 * Extraction is a three-state machine (outside, inside-target, inside-other)
 * driven by an explicit transition table. Marker names are compared as exact
 * tokens, so `%prep` and `%preun` are "other" markers while extracting `%pre`
 * and close a `%pre` body instead of opening one.
 *
 * Duplicate sections (one `%pre` per subpackage, for instance) are
 * concatenated in document order. An absent section yields an empty array.
 */

import type {
  ExtractorAction,
  ExtractorInput,
  ExtractorState,
  LineClass,
} from './types.js';

const MARKER_PATTERN = /^%([A-Za-z_][A-Za-z0-9_]*)/;

interface Transition {
  readonly next: ExtractorState;
  readonly action: ExtractorAction;
}

/**
 * Transition table of the extractor.
 *
 * Markers are never emitted. Content is emitted only while inside the
 * requested section.
 */
export const TRANSITIONS: Readonly<Record<ExtractorState, Readonly<Record<ExtractorInput, Transition>>>> = {
  'outside': {
    'target-marker': { next: 'inside-target', action: 'skip' },
    'other-marker': { next: 'inside-other', action: 'skip' },
    'content': { next: 'outside', action: 'skip' },
  },
  'inside-target': {
    'target-marker': { next: 'inside-target', action: 'skip' },
    'other-marker': { next: 'inside-other', action: 'skip' },
    'content': { next: 'inside-target', action: 'emit' },
  },
  'inside-other': {
    'target-marker': { next: 'inside-target', action: 'skip' },
    'other-marker': { next: 'inside-other', action: 'skip' },
    'content': { next: 'inside-other', action: 'skip' },
  },
};

/**
 * Classify a single line as a section marker or as content.
 *
 * @example
 * classifyLine('%pre -n cephadm')  // { kind: 'marker', name: 'pre' }
 * classifyLine('%{_bindir}/ceph')  // { kind: 'content' }
 * classifyLine('  %build')         // { kind: 'content' } (not column 0)
 */
export function classifyLine(line: string): LineClass {
  const match = MARKER_PATTERN.exec(line);
  if (match === null || match[1] === undefined) {
    return { kind: 'content' };
  }
  return { kind: 'marker', name: match[1] };
}

/** Split document text into lines, accepting both LF and CRLF endings. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  // A trailing newline does not start another line.
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function toInput(cls: LineClass, target: string): ExtractorInput {
  if (cls.kind === 'content') return 'content';
  return cls.name === target ? 'target-marker' : 'other-marker';
}

/**
 * Return the content lines of every section named `name`, in document order.
 *
 * `name` may be given with or without its leading `%`.
 */
export function extractSection(lines: ReadonlyArray<string>, name: string): string[] {
  const target = name.startsWith('%') ? name.slice(1) : name;
  const out: string[] = [];
  let state: ExtractorState = 'outside';

  for (const line of lines) {
    const transition: Transition = TRANSITIONS[state][toInput(classifyLine(line), target)];
    if (transition.action === 'emit') {
      out.push(line);
    }
    state = transition.next;
  }

  return out;
}

/**
 * Group every section of the document by name.
 *
 * Content before the first marker (the preamble) is not included.
 */
export function extractSections(lines: ReadonlyArray<string>): Map<string, string[]> {
  const sections = new Map<string, string[]>();
  let current: string[] | undefined;

  for (const line of lines) {
    const cls = classifyLine(line);
    if (cls.kind === 'marker') {
      current = sections.get(cls.name);
      if (current === undefined) {
        current = [];
        sections.set(cls.name, current);
      }
      continue;
    }
    current?.push(line);
  }

  return sections;
}
