/**
 * Find the pull request number referenced by a commit subject.
 *
 * Matches the first run of digits preceded by `#` or `PR` (case-sensitive),
 * with optional whitespace in between.
 *
 * @param message - Commit subject.
 * @returns Number as a string, or null when none is referenced.
 */
export function extractPullRequestNumber(message: string): string | null {
  let match = message.match(/(?:#|PR)\s*(?<number>\d+)/u)
  return match?.groups?.['number'] ?? null
}
