import type { CommitRecord } from '../../types/commit-record'

import { FIELD_SEPARATOR } from '../constants'

/**
 * Parse a `hash||subject||author` line.
 *
 * The subject is everything between the first and the last separator, so a
 * subject containing `||` is kept intact.
 *
 * @param line - Line produced by `git log`.
 * @returns Parsed commit, or null when the line has fewer than two separators.
 */
export function parseCommitLine(line: string): CommitRecord | null {
  let first = line.indexOf(FIELD_SEPARATOR)
  let last = line.lastIndexOf(FIELD_SEPARATOR)
  if (first === -1 || first === last) {
    return null
  }

  return {
    message: line.slice(first + FIELD_SEPARATOR.length, last),
    authorName: line.slice(last + FIELD_SEPARATOR.length).trim(),
    shortHash: line.slice(0, first).trim(),
  }
}
