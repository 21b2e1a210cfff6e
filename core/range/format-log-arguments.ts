import type { CommitRange } from '../../types/commit-range'

import { LOG_FORMAT } from '../constants'

/**
 * Build `git log` arguments for a commit range.
 *
 * @param range - Range to query.
 * @returns Arguments for git.
 */
export function formatLogArguments(range: CommitRange): string[] {
  let pretty = `--pretty=format:${LOG_FORMAT}`

  switch (range.type) {
    case 'capped-branch':
      return ['log', range.branch, '-n', String(range.limit), pretty]
    case 'branch-diff':
      return ['log', `${range.from}..${range.branch}`, pretty]
    case 'explicit':
      return ['log', `${range.from}..${range.to}`, pretty]
    case 'capped':
      return ['log', range.ref, '-n', String(range.limit), pretty]
  }
}
