import { execFileSync } from 'node:child_process'

/**
 * Run a git command and return its standard output.
 *
 * Throws when git exits with a non-zero status or cannot be spawned.
 *
 * @param args - Arguments passed to git.
 * @param cwd - Repository directory.
 * @returns Command output with trailing whitespace removed.
 */
export function runGit(args: string[], cwd: string = process.cwd()): string {
  let output = execFileSync('git', args, {
    stdio: ['ignore', 'pipe', 'ignore'],
    maxBuffer: 64 * 1024 * 1024,
    encoding: 'utf8',
    cwd,
  })
  return output.trimEnd()
}
