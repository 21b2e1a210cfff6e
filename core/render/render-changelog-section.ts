import type { ChangelogEntry } from '../../types/changelog-entry'

import { formatPullRequestLink } from './format-pull-request-link'
import { EMPTY_RANGE_MESSAGE } from '../constants'

/**
 * Render the Markdown section of a release.
 *
 * @param tag - Release tag used as the heading.
 * @param entries - Entries in display order.
 * @param repositoryUrl - Repository base URL for pull request links.
 * @returns Heading followed by one bullet per entry.
 */
export function renderChangelogSection(
  tag: string,
  entries: ChangelogEntry[],
  repositoryUrl?: string,
): string {
  let lines = [`## ${tag}`]

  if (entries.length === 0) {
    lines.push(EMPTY_RANGE_MESSAGE)
  }

  for (let entry of entries) {
    let link = formatPullRequestLink(entry.prNumber, repositoryUrl)
    lines.push(`- ${entry.title} by ${entry.author} (${link})`)
  }

  return lines.join('\n')
}
