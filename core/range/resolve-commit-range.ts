import type { CommitRange } from '../../types/commit-range'

/** Inputs for range resolution, already read from git. */
interface ResolveCommitRangeParameters {
  /** All tags, newest first. */
  tags: string[]

  /** Whether the requested tag exists. */
  tagExists: boolean

  /** Base branch for fallbacks. */
  branch: string

  /** Cap for ranges without a lower bound. */
  limit: number

  /** Requested tag. */
  tag: string
}

/**
 * Choose the commit range describing a release.
 *
 * Rules:
 *
 * - Existing tag with an older tag after it in the list: `previous..tag`.
 * - Existing tag without a predecessor: last `limit` commits of the tag.
 * - Missing tag while other tags exist: `newest..branch`.
 * - No tags at all: last `limit` commits of the branch.
 *
 * @param parameters - Resolution inputs.
 * @returns Range to pass to `git log`.
 */
export function resolveCommitRange(
  parameters: ResolveCommitRangeParameters,
): CommitRange {
  let { tagExists, branch, limit, tags, tag } = parameters

  if (tagExists) {
    let index = tags.indexOf(tag)
    let previous = index === -1 ? undefined : tags[index + 1]
    if (previous) {
      return { type: 'explicit', from: previous, to: tag }
    }
    return { type: 'capped', ref: tag, limit }
  }

  let [newest] = tags
  if (newest) {
    return { type: 'branch-diff', from: newest, branch }
  }

  return { type: 'capped-branch', branch, limit }
}
