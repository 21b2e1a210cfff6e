import pc from 'picocolors'

import type { CommitRange } from '../../types/commit-range'

import { DEFAULT_COMMIT_LIMIT, DEFAULT_BRANCH } from '../constants'
import { describeCommitRange } from './describe-commit-range'
import { resolveCommitRange } from './resolve-commit-range'
import { hasReference } from '../git/has-reference'
import { listTags } from '../git/list-tags'

/** Options for reading the range of a release from git. */
interface GetCommitRangeOptions {
  branch?: string
  limit?: number
  cwd?: string
  tag: string
}

/**
 * Read tags from git and resolve the commit range of a release.
 *
 * Prints a warning when the tag is missing and a branch fallback is used. A
 * base branch that does not exist locally is replaced with `HEAD`.
 *
 * @param options - Tag, fallback branch, commit cap and repository directory.
 * @returns Range to pass to `git log`.
 */
export function getCommitRange(options: GetCommitRangeOptions): CommitRange {
  let {
    limit = DEFAULT_COMMIT_LIMIT,
    branch = DEFAULT_BRANCH,
    cwd,
    tag,
  } = options

  let tags = listTags(cwd)
  let tagExists = hasReference(`refs/tags/${tag}`, cwd)

  if (tagExists) {
    return resolveCommitRange({ tagExists, branch, limit, tags, tag })
  }

  if (!hasReference(`refs/heads/${branch}`, cwd)) {
    console.warn(pc.yellow(`⚠️  Branch "${branch}" not found, using HEAD`))
    branch = 'HEAD'
  }

  let range = resolveCommitRange({ tagExists, branch, limit, tags, tag })
  console.warn(
    pc.yellow(
      `⚠️  Tag "${tag}" not found, using ${describeCommitRange(range)}`,
    ),
  )
  return range
}
