import type { createSpinner } from 'nanospinner'

import pc from 'picocolors'

import type { ChangelogResult } from '../types/changelog-result'

import { describeCommitRange } from '../core/range/describe-commit-range'

/** Spinner returned by nanospinner. */
type Spinner = ReturnType<typeof createSpinner>

/**
 * Reports how many commits were read and how many became entries.
 *
 * @param spinner - Status spinner to complete.
 * @param result - Built changelog.
 */
export function printRangeSummary(
  spinner: Spinner,
  result: ChangelogResult,
): void {
  let pluralRules = new Intl.PluralRules('en-US', { type: 'cardinal' })
  let noun = pluralRules.select(result.commits) === 'one' ? 'commit' : 'commits'
  let skipped = result.commits - result.entries.length

  spinner.success(
    `Found ${pc.yellow(result.commits)} ${noun} in ` +
      `${pc.cyan(describeCommitRange(result.range))}${
        skipped > 0 ? pc.gray(` (${skipped} skipped)`) : ''
      }`,
  )
}
