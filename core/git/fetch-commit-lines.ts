import type { CommitRange } from '../../types/commit-range'

import { formatLogArguments } from '../range/format-log-arguments'
import { runGit } from './run-git'

/**
 * Read `hash||subject||author` lines for a commit range.
 *
 * A failing git call (bad range, no repository) is reported as an empty range.
 *
 * @param range - Range to read.
 * @param cwd - Repository directory.
 * @returns Non-blank log lines, newest first.
 */
export function fetchCommitLines(range: CommitRange, cwd?: string): string[] {
  let output: string
  try {
    output = runGit(formatLogArguments(range), cwd)
  } catch {
    return []
  }

  return output.split(/\r?\n/u).filter(line => line.trim() !== '')
}
