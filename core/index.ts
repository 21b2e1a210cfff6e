export { extractPullRequestNumber } from './parsing/extract-pull-request-number'
export { renderChangelogSection } from './render/render-changelog-section'
export { formatPullRequestLink } from './render/format-pull-request-link'
export { describeCommitRange } from './range/describe-commit-range'
export { resolveCommitRange } from './range/resolve-commit-range'
export { cleanCommitMessage } from './parsing/clean-commit-message'
export { toChangelogEntry } from './parsing/to-changelog-entry'
export { collectChangelogEntries } from './collect-changelog-entries'
export { parseCommitLine } from './parsing/parse-commit-line'
export { fetchCommitLines } from './git/fetch-commit-lines'
export { getCommitRange } from './range/get-commit-range'
export { buildChangelog } from './build-changelog'

export type { ChangelogOptions } from '../types/changelog-options'
export type { ChangelogResult } from '../types/changelog-result'
export type { ChangelogEntry } from '../types/changelog-entry'
export type { CommitRecord } from '../types/commit-record'
export type { CommitRange } from '../types/commit-range'
