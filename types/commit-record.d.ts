/** Commit parsed from one line of `git log` output. */
export interface CommitRecord {
  /** Abbreviated commit hash (`%h`). */
  shortHash: string

  /** Author name (`%an`). */
  authorName: string

  /** Commit subject (`%s`). */
  message: string
}
