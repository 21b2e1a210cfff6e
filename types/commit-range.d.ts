/** Range between the previous tag and the requested one. */
interface ExplicitRange {
  type: 'explicit'
  from: string
  to: string
}

/** Last `limit` commits reachable from a tag with no predecessor. */
interface CappedRange {
  type: 'capped'
  limit: number
  ref: string
}

/** Commits on the base branch since the newest tag. */
interface BranchDiffRange {
  type: 'branch-diff'
  branch: string
  from: string
}

/** Last `limit` commits of the base branch. */
interface CappedBranchRange {
  type: 'capped-branch'
  branch: string
  limit: number
}

/**
 * Commit range passed to `git log`.
 */
export type CommitRange =
  | CappedBranchRange
  | BranchDiffRange
  | ExplicitRange
  | CappedRange
