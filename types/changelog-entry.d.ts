/** Display line derived from a commit. */
export interface ChangelogEntry {
  /** Pull request number without the leading `#`, null when absent. */
  prNumber: string | null

  /** Cleaned commit subject. */
  title: string

  /** Commit author. */
  author: string
}
