/**
 * Crucible Kernel — Stage Plan and Image Naming
 *
 * Pure functions mapping (vendor, release) to cache keys, image references
 * and recipe invocations. Each stage's recipe receives its predecessor's
 * image as a build argument, so the chain is explicit in the recipes too.
 */

import { ConfigurationError } from '../errors.js';
import {
  ANY,
  BuildStage,
  CACHED_STAGES,
  type CacheKey,
  type ImageNaming,
  type ImageRef,
  type StagePlan,
} from '../types/stage.js';

/** Recipe file per cached stage, relative to the recipes directory. */
export const STAGE_RECIPES: Readonly<Record<BuildStage, string>> = {
  [BuildStage.Bootstrap]: 'seed/Containerfile',
  [BuildStage.ReleaseBase]: 'release/Containerfile',
  [BuildStage.BuildEnvironment]: 'build/Containerfile',
  [BuildStage.Final]: '',
};

/** Tag carried by the most recent final image of a named build. */
export const LATEST_TAG = 'latest';

const COMPONENT_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

/**
 * Reject a vendor, release or build name that cannot be used as an image
 * reference component.
 */
export function assertImageComponent(label: string, value: string): void {
  if (!COMPONENT_PATTERN.test(value)) {
    throw new ConfigurationError(
      `invalid ${label} '${value}': expected lowercase letters, digits, '.', '_' or '-'`,
    );
  }
}

export function cacheKey(stage: BuildStage, vendor: string, release: string): CacheKey {
  return stage === BuildStage.Bootstrap
    ? { stage, vendor: ANY, release: ANY }
    : { stage, vendor, release };
}

/** Stable identifier for a key, usable as a file name. */
export function cacheKeyId(key: CacheKey): string {
  const part = (value: string): string => (value === ANY ? '_' : value);
  return `${key.stage}--${part(key.vendor)}--${part(key.release)}`;
}

export function seedImage(naming: ImageNaming): ImageRef {
  return `${naming.namespace}/seed:${naming.seedTag}`;
}

export function releaseBaseImage(naming: ImageNaming, vendor: string, release: string): ImageRef {
  return `${naming.namespace}/base/${vendor}:${release}`;
}

export function builderImage(naming: ImageNaming, vendor: string, release: string): ImageRef {
  return `${naming.namespace}/builder/${vendor}:${release}`;
}

/**
 * Repository of the final images. Named builds get their own repository;
 * anonymous builds are grouped by vendor and release.
 */
export function finalRepository(
  naming: ImageNaming,
  vendor: string,
  release: string,
  buildName?: string,
): string {
  const root = `${naming.namespace}-builds`;
  return buildName === undefined ? `${root}/${vendor}/${release}` : `${root}/${buildName}`;
}

export function latestImage(naming: ImageNaming, buildName: string): ImageRef {
  return `${naming.namespace}-builds/${buildName}:${LATEST_TAG}`;
}

/** `YYYYMMDDTHHMMSSZ` in UTC. */
export function timestampTag(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

/**
 * The ordered chain of cached stages for one (vendor, release).
 */
export function stagePlan(vendor: string, release: string, naming: ImageNaming): StagePlan[] {
  assertImageComponent('vendor', vendor);
  assertImageComponent('release', release);

  const images: Readonly<Record<BuildStage, ImageRef>> = {
    [BuildStage.Bootstrap]: seedImage(naming),
    [BuildStage.ReleaseBase]: releaseBaseImage(naming, vendor, release),
    [BuildStage.BuildEnvironment]: builderImage(naming, vendor, release),
    [BuildStage.Final]: '',
  };

  const releaseArgs = { CEPH_VENDOR: vendor, CEPH_RELEASE: release };

  const buildArgs: Readonly<Record<BuildStage, Readonly<Record<string, string>>>> = {
    [BuildStage.Bootstrap]: {},
    [BuildStage.ReleaseBase]: { ...releaseArgs, SEED_IMAGE: images[BuildStage.Bootstrap] },
    [BuildStage.BuildEnvironment]: { ...releaseArgs, BASE_IMAGE: images[BuildStage.ReleaseBase] },
    [BuildStage.Final]: {},
  };

  return CACHED_STAGES.map((stage) => ({
    stage,
    key: cacheKey(stage, vendor, release),
    image: images[stage],
    recipe: STAGE_RECIPES[stage],
    buildArgs: buildArgs[stage],
  }));
}
