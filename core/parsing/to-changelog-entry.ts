import type { ChangelogEntry } from '../../types/changelog-entry'
import type { CommitRecord } from '../../types/commit-record'

import { extractPullRequestNumber } from './extract-pull-request-number'
import { cleanCommitMessage } from './clean-commit-message'

/**
 * Convert a commit into a changelog entry.
 *
 * @param commit - Parsed commit.
 * @returns Entry, or null when the cleaned title is empty (merge commits).
 */
export function toChangelogEntry(commit: CommitRecord): ChangelogEntry | null {
  let title = cleanCommitMessage(commit.message)
  if (!title) {
    return null
  }

  return {
    prNumber: extractPullRequestNumber(commit.message),
    author: commit.authorName,
    title,
  }
}
