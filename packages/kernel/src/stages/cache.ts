/**
 * Crucible Kernel — Stage Cache
 *
 * Walks the stage chain and builds each image that is absent (or every
 * image, when forced). Per stage:
 *
 *   1. acquire the advisory lock for its CacheKey (when a StageLock is set)
 *   2. query existence
 *   3. skip when present and not forced
 *   4. check the predecessor is present, build, then verify presence
 *   5. release the lock
 *
 * Without a StageLock, two processes may both observe a stage as absent and
 * build it twice. The second build replaces the tag; nothing is corrupted.
 */

import type { ImageStore, StageLock } from '../adapters/index.js';
import { StageBuildError, StageOrderError } from '../errors.js';
import type { BuildLogger } from '../logging/build-log.js';
import type { ImageNaming, StageOutcome, StagePlan } from '../types/stage.js';
import { stagePlan } from './plan.js';

export interface StageCacheDeps {
  readonly store: ImageStore;
  readonly naming: ImageNaming;
  readonly lock?: StageLock | undefined;
  readonly logger?: BuildLogger | undefined;
}

export interface EnsureOptions {
  /** Rebuild every stage even when its image exists. */
  readonly force?: boolean | undefined;
}

export class StageCache {
  constructor(private readonly deps: StageCacheDeps) {}

  /**
   * Make sure every cached stage image for (vendor, release) exists.
   *
   * @returns One outcome per stage, in chain order
   * @throws {StageOrderError} When a predecessor image disappeared mid-run
   * @throws {StageBuildError} When a recipe build fails or leaves no image
   */
  async ensure(vendor: string, release: string, options: EnsureOptions = {}): Promise<StageOutcome[]> {
    const plan = stagePlan(vendor, release, this.deps.naming);
    const outcomes: StageOutcome[] = [];

    let previous: StagePlan | undefined;
    for (const step of plan) {
      outcomes.push(await this.ensureStage(vendor, release, step, previous, options.force === true));
      previous = step;
    }
    return outcomes;
  }

  private async ensureStage(
    vendor: string,
    release: string,
    step: StagePlan,
    previous: StagePlan | undefined,
    force: boolean,
  ): Promise<StageOutcome> {
    const { store, lock, logger } = this.deps;
    const handle = lock === undefined ? undefined : await lock.acquire(step.key);

    try {
      if (!force && (await store.exists(step.image))) {
        logger?.record(vendor, release, { kind: 'stage.skipped', stage: step.stage, detail: step.image });
        return { stage: step.stage, image: step.image, status: 'skipped' };
      }

      if (previous !== undefined && !(await store.exists(previous.image))) {
        throw new StageOrderError(step.stage, previous.image);
      }

      logger?.record(vendor, release, { kind: 'stage.building', stage: step.stage, detail: step.image });
      try {
        await store.build({ image: step.image, recipe: step.recipe, buildArgs: step.buildArgs });
      } catch (err: unknown) {
        logger?.record(vendor, release, { kind: 'stage.failed', stage: step.stage, detail: step.image });
        throw new StageBuildError(step.stage, step.image, err);
      }

      if (!(await store.exists(step.image))) {
        logger?.record(vendor, release, { kind: 'stage.failed', stage: step.stage, detail: step.image });
        throw new StageBuildError(step.stage, step.image, new Error('image not present after build'));
      }

      logger?.record(vendor, release, { kind: 'stage.built', stage: step.stage, detail: step.image });
      return { stage: step.stage, image: step.image, status: 'built' };
    } finally {
      await handle?.release();
    }
  }
}
