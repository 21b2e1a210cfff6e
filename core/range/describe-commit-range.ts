import type { CommitRange } from '../../types/commit-range'

/**
 * Human-readable form of a commit range, used in status messages.
 *
 * @param range - Range to describe.
 * @returns Short description such as `v1.0.0..v1.1.0`.
 */
export function describeCommitRange(range: CommitRange): string {
  switch (range.type) {
    case 'capped-branch':
      return `last ${range.limit} commits of ${range.branch}`
    case 'branch-diff':
      return `${range.from}..${range.branch}`
    case 'explicit':
      return `${range.from}..${range.to}`
    case 'capped':
      return `last ${range.limit} commits of ${range.ref}`
  }
}
