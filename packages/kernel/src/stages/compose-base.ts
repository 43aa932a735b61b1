/**
 * Crucible Kernel — Compose Base Resolution
 *
 * Picks the image the Image Composer starts from. An incremental build
 * layers onto the build's previous `latest` image; when there is none, it
 * silently falls back to the release base.
 */

import type { ImageStore } from '../adapters/index.js';
import type { ImageNaming, ImageRef } from '../types/stage.js';
import { latestImage, releaseBaseImage } from './plan.js';

export interface ComposeBaseRequest {
  readonly vendor: string;
  readonly release: string;
  readonly buildName?: string | undefined;
  readonly incremental: boolean;
}

export interface ComposeBase {
  readonly ref: ImageRef;
  /** True when composing on top of a previous final image. */
  readonly incremental: boolean;
}

export async function resolveComposeBase(
  store: ImageStore,
  naming: ImageNaming,
  request: ComposeBaseRequest,
): Promise<ComposeBase> {
  const base = releaseBaseImage(naming, request.vendor, request.release);

  if (!request.incremental || request.buildName === undefined) {
    return { ref: base, incremental: false };
  }

  const latest = latestImage(naming, request.buildName);
  if (await store.exists(latest)) {
    return { ref: latest, incremental: true };
  }
  return { ref: base, incremental: false };
}
