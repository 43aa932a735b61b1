/**
 * Groups the final images of a build by image id, so a timestamped image
 * that is also `latest` is shown once.
 */

import { LATEST_TAG, type ImageSummary } from '@crucible/kernel'

export interface BuildImageRow {
  readonly id: string
  readonly tags: ReadonlyArray<string>
  readonly latest: boolean
  readonly createdAt: string
}

/** Newest first; tags sorted, `latest` folded into the flag. */
export function groupBuildImages(images: ReadonlyArray<ImageSummary>): BuildImageRow[] {
  const byId = new Map<string, { tags: Set<string>; createdAt: string }>()
  for (const image of images) {
    const entry = byId.get(image.id) ?? { tags: new Set<string>(), createdAt: image.createdAt }
    entry.tags.add(image.tag)
    byId.set(image.id, entry)
  }

  const rows = [...byId].map(([id, entry]) => ({
    id,
    tags: [...entry.tags].filter((tag) => tag !== LATEST_TAG).sort(),
    latest: entry.tags.has(LATEST_TAG),
    createdAt: entry.createdAt,
  }))
  return rows.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id))
}

export function formatImageRow(row: BuildImageRow): string {
  const tags = row.tags.length === 0 ? '<untagged>' : row.tags.join(', ')
  return `${row.id.slice(0, 12)}  ${tags}${row.latest ? '  (latest)' : ''}`
}
