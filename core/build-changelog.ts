import type { ChangelogOptions } from '../types/changelog-options'
import type { ChangelogResult } from '../types/changelog-result'

import { renderChangelogSection } from './render/render-changelog-section'
import { collectChangelogEntries } from './collect-changelog-entries'
import { fetchCommitLines } from './git/fetch-commit-lines'
import { getCommitRange } from './range/get-commit-range'
import { DEFAULT_REPOSITORY_URL } from './constants'

/**
 * Build the changelog section of a release from git history.
 *
 * @param options - Tag and optional overrides.
 * @returns Range, entries and rendered Markdown.
 */
export function buildChangelog(options: ChangelogOptions): ChangelogResult {
  let { repositoryUrl = DEFAULT_REPOSITORY_URL, limit, branch, cwd, tag } =
    options

  let range = getCommitRange({ branch, limit, cwd, tag })
  let lines = fetchCommitLines(range, cwd)
  let entries = collectChangelogEntries(lines)

  return {
    section: renderChangelogSection(tag, entries, repositoryUrl),
    commits: lines.length,
    entries,
    range,
  }
}
