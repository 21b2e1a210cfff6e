import type { ChangelogEntry } from './changelog-entry'
import type { CommitRange } from './commit-range'

/**
 * Result of building the changelog section of a release.
 */
export interface ChangelogResult {
  /**
   * Entries rendered in the section, newest first.
   */
  entries: ChangelogEntry[]

  /**
   * Range the commits were read from.
   */
  range: CommitRange

  /**
   * Number of commits in the range, including skipped merge commits.
   */
  commits: number

  /**
   * Rendered Markdown section.
   */
  section: string
}
