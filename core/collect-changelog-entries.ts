import type { ChangelogEntry } from '../types/changelog-entry'

import { toChangelogEntry } from './parsing/to-changelog-entry'
import { parseCommitLine } from './parsing/parse-commit-line'

/**
 * Turn raw `git log` lines into changelog entries, keeping their order.
 *
 * @param lines - Lines in `hash||subject||author` format.
 * @returns Entries for lines whose cleaned subject is not empty.
 */
export function collectChangelogEntries(lines: string[]): ChangelogEntry[] {
  let entries: ChangelogEntry[] = []
  for (let line of lines) {
    let commit = parseCommitLine(line)
    if (!commit) {
      continue
    }
    let entry = toChangelogEntry(commit)
    if (entry) {
      entries.push(entry)
    }
  }
  return entries
}
