/**
 * Turn a commit subject into a changelog title.
 *
 * Steps, in order:
 *
 * - Remove `(#123)` and bare `#123` references.
 * - Drop everything from `Merge pull request` onward.
 * - Drop everything from `from` onward.
 * - Remove `PR 123` tokens.
 * - Trim and capitalize the first letter.
 *
 * A title without `#123`, `PR 123`, `Merge pull request` or `from` is returned
 * unchanged apart from capitalization, so cleaning such a title twice gives the
 * same result.
 *
 * @param message - Commit subject.
 * @returns Cleaned title, empty when nothing meaningful is left.
 */
export function cleanCommitMessage(message: string): string {
  let title = message
    .replaceAll(/\(#\d+\)/gu, '')
    .replaceAll(/#\d+/gu, '')
    .replace(/Merge pull request.*$/u, '')
    .replace(/from.*$/u, '')
    .replaceAll(/PR\s*\d+/gu, '')
    .trim()

  return title.charAt(0).toUpperCase() + title.slice(1)
}
