import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import { DEFAULT_REPOSITORY_URL, DEFAULT_BRANCH } from '../core/constants'
import { printRangeSummary } from './print-range-summary'
import { readRawOption } from './read-raw-option'
import { normalizeLimit } from './normalize-limit'
import { normalizeTag } from './normalize-tag'
import { buildChangelog } from '../core/index'
import { version } from '../package.json'

/** CLI Options. */
interface CLIOptions {
  /** Max commits for ranges without a lower bound. */
  limit?: number | string

  /** Release tag, an array when the flag is repeated. */
  tag?: (number | string)[] | number | string

  /** Repository URL used for pull request links. */
  repoUrl: string

  /** Base branch for missing-tag fallbacks. */
  branch: number | string

  /** Repository directory. */
  cwd?: string
}

/**
 * Run the CLI.
 *
 * @param argv - Command line arguments, including the node and script paths.
 */
export function run(argv: string[] = process.argv): void {
  let cli = cac('release-changelog')

  cli
    .help()
    .version(version)
    .option('--tag <name>', 'Release tag to describe')
    .option('--branch <name>', 'Base branch when the tag is missing', {
      default: DEFAULT_BRANCH,
    })
    .option('--limit <count>', 'Max commits when no previous tag exists')
    .option('--repo-url <url>', 'Repository URL for pull request links', {
      default: DEFAULT_REPOSITORY_URL,
    })
    .option('--cwd <path>', 'Repository directory (default: current)')
    .command('', 'Print the changelog section of a release')
    .action((options: CLIOptions) => {
      let spinner = createSpinner('Reading git history...', {
        stream: process.stderr,
      }).start()

      try {
        let tag = normalizeTag(readRawOption(argv, 'tag') ?? options.tag)
        let branch = readRawOption(argv, 'branch') ?? String(options.branch)
        let limit = normalizeLimit(options.limit)

        let result = buildChangelog({
          repositoryUrl: options.repoUrl,
          cwd: options.cwd,
          branch,
          limit,
          tag,
        })

        printRangeSummary(spinner, result)

        console.info(`# Changelog\n\n${result.section}`)
      } catch (error) {
        spinner.error('Failed')
        console.error(
          pc.redBright('\nError:'),
          error instanceof Error ? error.message : String(error),
        )
        process.exit(1)
      }
    })

  cli.parse(argv)
}
