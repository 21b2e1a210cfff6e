import { DEFAULT_REPOSITORY_URL } from '../constants'

/**
 * Build a Markdown link to a pull request.
 *
 * @param prNumber - Pull request number, null when the commit has none.
 * @param repositoryUrl - Repository base URL.
 * @returns Link such as `[#42](https://…/pull/42)`, or an empty string.
 */
export function formatPullRequestLink(
  prNumber: string | null,
  repositoryUrl: string = DEFAULT_REPOSITORY_URL,
): string {
  if (!prNumber) {
    return ''
  }
  let base = repositoryUrl.replace(/\/+$/u, '')
  return `[#${prNumber}](${base}/pull/${prNumber})`
}
