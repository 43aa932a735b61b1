/**
 * Crucible Kernel — Image Composer
 *
 * Assembles a final image from a base image and an install tree:
 *
 *   from(base) → mount → sync tree → run /post-install.sh → remove it
 *     → commit <ns>-builds/<name>:<timestamp> → tag :latest → unmount
 *
 * Any failure before the commit throws ComposeError carrying the working
 * container id and nothing is committed. The working container is unmounted
 * and removed on every path. After a failure, cleanup errors are logged as
 * compose.cleanup-failed and the ComposeError is what propagates.
 */

import { join } from 'node:path';
import type { RootRunner, TreeSync, WorkingContainers, WorkspaceFs } from '../adapters/index.js';
import { ComposeError, messageOf, type ComposePhase } from '../errors.js';
import type { BuildLogger } from '../logging/build-log.js';
import { LATEST_TAG, finalRepository, timestampTag } from '../stages/plan.js';
import { POST_INSTALL_SCRIPT, type ComposeRequest, type ComposeResult } from '../types/job.js';
import type { ImageNaming } from '../types/stage.js';

export interface ImageComposerDeps {
  readonly containers: WorkingContainers;
  readonly sync: TreeSync;
  readonly root: RootRunner;
  readonly fs: WorkspaceFs;
  readonly naming: ImageNaming;
  readonly logger?: BuildLogger | undefined;
  readonly now?: (() => Date) | undefined;
}

/** PATH for the post-install script inside the target root. */
export const POST_INSTALL_PATH = '/usr/sbin:/usr/bin:/sbin:/bin';

export class ImageComposer {
  constructor(private readonly deps: ImageComposerDeps) {}

  async compose(request: ComposeRequest): Promise<ComposeResult> {
    const { containers, logger } = this.deps;
    const { vendor, release } = request;
    const now = this.deps.now ?? (() => new Date());

    logger?.record(vendor, release, { kind: 'compose.started', detail: request.base });

    let containerId: string | null = null;
    const phase = async <T>(name: ComposePhase, body: () => Promise<T>): Promise<T> => {
      try {
        return await body();
      } catch (err: unknown) {
        logger?.record(vendor, release, { kind: 'compose.failed', detail: `${name}: ${messageOf(err)}` });
        throw new ComposeError(name, containerId, err);
      }
    };

    containerId = await phase('from', () => containers.from(request.base));
    const id = containerId;

    let mounted = false;
    let result: ComposeResult;
    try {
      const mountPoint = await phase('mount', () => containers.mount(id));
      mounted = true;

      await phase('sync', () => this.deps.sync.sync(request.installTree, mountPoint));
      const postInstallRan = await phase('post-install', () => this.runPostInstall(mountPoint));
      if (postInstallRan) {
        logger?.record(vendor, release, { kind: 'compose.post-install' });
      }

      const image = `${finalRepository(this.deps.naming, vendor, release, request.buildName)}:${timestampTag(now())}`;
      await phase('commit', () => containers.commit(id, image));

      let latest: string | null = null;
      if (request.buildName !== undefined) {
        const alias = `${finalRepository(this.deps.naming, vendor, release, request.buildName)}:${LATEST_TAG}`;
        await phase('tag', () => containers.tag(image, alias));
        latest = alias;
      }

      logger?.record(vendor, release, { kind: 'compose.committed', detail: image });
      result = { image, latest, postInstallRan };
    } catch (err: unknown) {
      await this.discard(id, mounted, vendor, release);
      throw err;
    }

    await containers.unmount(id);
    await containers.remove(id);
    return result;
  }

  /** Unmount and remove a failed working container, logging what goes wrong. */
  private async discard(id: string, mounted: boolean, vendor: string, release: string): Promise<void> {
    const { containers, logger } = this.deps;
    const attempt = async (what: string, body: () => Promise<void>): Promise<void> => {
      try {
        await body();
      } catch (err: unknown) {
        logger?.record(vendor, release, { kind: 'compose.cleanup-failed', detail: `${what} ${id}: ${messageOf(err)}` });
      }
    };

    if (mounted) {
      await attempt('unmount', () => containers.unmount(id));
    }
    await attempt('remove', () => containers.remove(id));
  }

  /** Run and delete the post-install script; false when there is none. */
  private async runPostInstall(mountPoint: string): Promise<boolean> {
    const { fs, root } = this.deps;
    const hostPath = join(mountPoint, POST_INSTALL_SCRIPT);
    if ((await fs.kind(hostPath)) !== 'file') {
      return false;
    }
    await root.runScript(mountPoint, `/${POST_INSTALL_SCRIPT}`, { PATH: POST_INSTALL_PATH });
    await fs.remove(hostPath);
    return true;
  }
}
