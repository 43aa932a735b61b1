/**
 * Crucible Runtime Host — Podman Adapters
 *
 * PodmanImageStore implements ImageStore (images / build / rmi) and
 * PodmanContainerRunner implements ContainerRunner (run --rm).
 *
 * Image identity is an exact `repository:tag` match. Podman reports local
 * images with a `localhost/` registry prefix; it is stripped before
 * comparing, so `crucible/seed:leap-15.2` matches
 * `localhost/crucible/seed:leap-15.2`.
 */

import { join } from 'node:path';
import type {
  ContainerRunner,
  ContainerRunRequest,
  ExecAdapter,
  ImageBuildRequest,
  ImageStore,
  ImageSummary,
} from '@crucible/kernel';
import { runChecked } from '../adapters/exec.js';

const PODMAN = 'podman';
const LOCAL_REGISTRY = 'localhost/';

// ---------------------------------------------------------------------------
// Reference helpers
// ---------------------------------------------------------------------------

/** Strip the local registry prefix podman adds to unqualified names. */
export function normalizeRef(name: string): string {
  return name.startsWith(LOCAL_REGISTRY) ? name.slice(LOCAL_REGISTRY.length) : name;
}

/**
 * Split `repository:tag`. The tag separator is the last `:` after the last
 * `/`, so registry ports are not mistaken for tags.
 */
export function splitRef(ref: string): { repository: string; tag: string } {
  const slash = ref.lastIndexOf('/');
  const colon = ref.lastIndexOf(':');
  if (colon <= slash) {
    return { repository: ref, tag: 'latest' };
  }
  return { repository: ref.slice(0, colon), tag: ref.slice(colon + 1) };
}

/**
 * Parse `podman images --format json` output into one summary per name.
 * Entries without names (dangling images) are dropped.
 */
export function parseImageList(json: string): ImageSummary[] {
  const trimmed = json.trim();
  if (trimmed === '') return [];

  const parsed: unknown = JSON.parse(trimmed);
  if (!Array.isArray(parsed)) {
    throw new Error('podman images: expected a JSON array');
  }

  const entries: ReadonlyArray<unknown> = parsed;
  const summaries: ImageSummary[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null) continue;
    const id: unknown = Reflect.get(entry, 'Id');
    const names: unknown = Reflect.get(entry, 'Names');
    const createdAt: unknown = Reflect.get(entry, 'CreatedAt');
    if (typeof id !== 'string' || !Array.isArray(names)) continue;

    const nameList: ReadonlyArray<unknown> = names;
    for (const name of nameList) {
      if (typeof name !== 'string') continue;
      const ref = normalizeRef(name);
      const { repository, tag } = splitRef(ref);
      summaries.push({
        id,
        ref,
        repository,
        tag,
        createdAt: typeof createdAt === 'string' ? createdAt : '',
      });
    }
  }
  return summaries;
}

// ---------------------------------------------------------------------------
// PodmanImageStore
// ---------------------------------------------------------------------------

export class PodmanImageStore implements ImageStore {
  /**
   * @param recipesDir - Directory holding the stage recipes; also the build context
   */
  constructor(private readonly exec: ExecAdapter, private readonly recipesDir: string) {}

  async exists(ref: string): Promise<boolean> {
    const { repository } = splitRef(ref);
    const images = await this.list(repository);
    return images.some((image) => image.ref === ref);
  }

  async build(request: ImageBuildRequest): Promise<void> {
    const args = ['build', '-t', request.image];
    for (const [name, value] of Object.entries(request.buildArgs)) {
      args.push('--build-arg', `${name}=${value}`);
    }
    args.push('-f', join(this.recipesDir, request.recipe), this.recipesDir);
    await runChecked(this.exec, PODMAN, args, { inherit: true });
  }

  async list(repository: string): Promise<ReadonlyArray<ImageSummary>> {
    const result = await runChecked(this.exec, PODMAN, ['images', '--format', 'json', repository]);
    return parseImageList(result.stdout).filter((image) => image.repository === repository);
  }

  async remove(ref: string): Promise<void> {
    await runChecked(this.exec, PODMAN, ['rmi', ref]);
  }
}

// ---------------------------------------------------------------------------
// PodmanContainerRunner
// ---------------------------------------------------------------------------

export class PodmanContainerRunner implements ContainerRunner {
  constructor(private readonly exec: ExecAdapter) {}

  async run(request: ContainerRunRequest): Promise<void> {
    await runChecked(this.exec, PODMAN, runArgs(request), { inherit: true });
  }

  /** Interactive shell in a throwaway container. */
  async shell(image: string): Promise<void> {
    await runChecked(this.exec, PODMAN, ['run', '--rm', '-it', image, '/bin/bash'], { inherit: true });
  }
}

export function runArgs(request: ContainerRunRequest): string[] {
  const args = ['run', '--rm'];
  for (const mount of request.mounts) {
    args.push('-v', `${mount.host}:${mount.container}`);
  }
  for (const [name, value] of Object.entries(request.env)) {
    args.push('-e', `${name}=${value}`);
  }
  args.push('--entrypoint', '/bin/bash', request.image, request.script);
  return args;
}
