/** Branch used when the requested tag does not exist. */
export const DEFAULT_BRANCH = 'main'

/** Max commits read when a range has no lower bound. */
export const DEFAULT_COMMIT_LIMIT = 50

/** Repository that pull request links point to. */
export const DEFAULT_REPOSITORY_URL =
  'https://github.com/microsoft/durabletask-dotnet'

/** Separator between fields of a `git log` line. */
export const FIELD_SEPARATOR = '||'

/** Pretty format producing `hash||subject||author` lines. */
export const LOG_FORMAT = `%h${FIELD_SEPARATOR}%s${FIELD_SEPARATOR}%an`

/** Placeholder rendered under the heading when no entries exist. */
export const EMPTY_RANGE_MESSAGE = '*(No commits found in range)*'
