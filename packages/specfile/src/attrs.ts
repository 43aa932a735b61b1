/**
 * Crucible Specfile — Attribute Directive Parser
 *
 * Turns `%attr(mode,user,group) [qualifier] path` lines into permission
 * fix-up commands for the post-install script.
 *
 * Every line is parsed on its own. A malformed directive is reported and
 * skipped; it never prevents later lines from being parsed.
 *
 * Emission rules per directive:
 *   - `chmod <mode> <path>`          unless mode is `-`
 *   - `chown <user>:<group> <path>`  unless user or group is `-`
 */

import type { AttrDirective, AttrParseResult, MalformedAttr } from './types.js';

const ATTR_PATTERN = /^%attr\(([^)]*)\)(.*)$/;
const MODE_PATTERN = /^[0-7]{3,4}$/;
const OWNER_PATTERN = /^[^\s:,]+$/;

const UNCHANGED = '-';

/**
 * Parse one line. Lines that do not start with `%attr(` are `not-attr`.
 *
 * When qualifiers precede the path (`%attr(750,ceph,ceph) %ghost %dir /run/ceph`)
 * the last field is the path and the fields before it are the qualifier.
 */
export function parseAttrLine(text: string, line = 0): AttrParseResult {
  const match = ATTR_PATTERN.exec(text);
  if (match === null) {
    return { kind: 'not-attr' };
  }

  const fields = (match[1] ?? '').split(',').map((f) => f.trim());
  const [mode, user, group] = fields;
  if (fields.length !== 3 || mode === undefined || user === undefined || group === undefined) {
    return { kind: 'malformed', reason: `expected 3 attribute fields, found ${fields.length}` };
  }

  if (mode !== UNCHANGED && !MODE_PATTERN.test(mode)) {
    return { kind: 'malformed', reason: `invalid mode '${mode}'` };
  }
  if (user !== UNCHANGED && !OWNER_PATTERN.test(user)) {
    return { kind: 'malformed', reason: `invalid user '${user}'` };
  }
  if (group !== UNCHANGED && !OWNER_PATTERN.test(group)) {
    return { kind: 'malformed', reason: `invalid group '${group}'` };
  }

  const rest = (match[2] ?? '').trim().split(/\s+/).filter((t) => t !== '');
  const path = rest.at(-1);
  if (path === undefined) {
    return { kind: 'malformed', reason: 'missing path' };
  }
  const qualifiers = rest.slice(0, -1);

  const directive: AttrDirective = {
    mode,
    user,
    group,
    path,
    qualifier: qualifiers.length > 0 ? qualifiers.join(' ') : null,
    line,
  };
  return { kind: 'ok', directive };
}

/**
 * Scan all lines of a document for `%attr` directives, preserving order.
 */
export function parseAttrDirectives(lines: ReadonlyArray<string>): {
  readonly directives: ReadonlyArray<AttrDirective>;
  readonly malformed: ReadonlyArray<MalformedAttr>;
} {
  const directives: AttrDirective[] = [];
  const malformed: MalformedAttr[] = [];

  lines.forEach((text, index) => {
    const result = parseAttrLine(text, index + 1);
    switch (result.kind) {
      case 'ok':
        directives.push(result.directive);
        break;
      case 'malformed':
        malformed.push({ line: index + 1, text, reason: result.reason });
        break;
      case 'not-attr':
        break;
    }
  });

  return { directives, malformed };
}

/** Render the chmod/chown commands for one directive. */
export function renderAttrCommands(directive: AttrDirective): string[] {
  const commands: string[] = [];
  if (directive.mode !== UNCHANGED) {
    commands.push(`chmod ${directive.mode} ${directive.path}`);
  }
  if (directive.user !== UNCHANGED && directive.group !== UNCHANGED) {
    commands.push(`chown ${directive.user}:${directive.group} ${directive.path}`);
  }
  return commands;
}
