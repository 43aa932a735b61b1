/**
 * Crucible Specfile — Version Descriptor Tests
 */

import { describe, it, expect } from 'vitest';
import { parseDescribe } from '../src/version.js';
import { VersionFormatError } from '../src/types.js';

describe('parseDescribe', () => {
  it('splits a release tag into version and release', () => {
    expect(parseDescribe('v16.2.0-123-gabc1234\n')).toEqual({
      version: '16.2.0-123-gabc1234',
      rpmVersion: '16.2.0',
      rpmRelease: '123.gabc1234',
    });
  });

  it('replaces every dash of a pre-release tag in the release', () => {
    expect(parseDescribe('v17.0.0-rc1-5-g0ff1ce0')).toEqual({
      version: '17.0.0-rc1-5-g0ff1ce0',
      rpmVersion: '17.0.0',
      rpmRelease: 'rc1.5.g0ff1ce0',
    });
  });

  it('accepts a tag without the leading v', () => {
    expect(parseDescribe('15.2.8-0-gdeadbee').rpmVersion).toBe('15.2.8');
  });

  it('rejects output without a commit count and hash', () => {
    expect(() => parseDescribe('v16.2.0')).toThrow(VersionFormatError);
  });

  it('rejects an abbreviated hash without --long', () => {
    expect(() => parseDescribe('abc1234')).toThrow(VersionFormatError);
  });
});
