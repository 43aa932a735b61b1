/**
 * Crucible Specfile — Version Descriptor
 *
 * Derives the package version and release from `git describe --long
 * --match 'v*'` output (`v<tag>-<commits>-g<hash>`).
 *
 *   rpmVersion  everything before the first `-`, without the leading `v`
 *   rpmRelease  everything after the first `-`, with `-` replaced by `.`
 *               (a release qualifier cannot contain `-`)
 */

import { VersionFormatError, type VersionDescriptor } from './types.js';

const DESCRIBE_PATTERN = /^(.+)-(\d+)-(g[0-9a-f]+)$/;

export function parseDescribe(output: string): VersionDescriptor {
  const trimmed = output.trim();
  const version = trimmed.startsWith('v') ? trimmed.slice(1) : trimmed;

  if (!DESCRIBE_PATTERN.test(version)) {
    throw new VersionFormatError(output);
  }

  const dash = version.indexOf('-');
  return {
    version,
    rpmVersion: version.slice(0, dash),
    rpmRelease: version.slice(dash + 1).replace(/-/g, '.'),
  };
}
