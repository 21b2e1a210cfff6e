/** Options for building a changelog section. */
export interface ChangelogOptions {
  /** Base URL of the repository used for pull request links. */
  repositoryUrl?: string

  /** Max commits for ranges without a lower bound. */
  limit?: number

  /** Base branch used when the tag does not exist. */
  branch?: string

  /** Repository directory, defaults to the current one. */
  cwd?: string

  /** Tag to describe. */
  tag: string
}
