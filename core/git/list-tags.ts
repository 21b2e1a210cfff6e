import { runGit } from './run-git'

/**
 * List all tags sorted by creation date, newest first.
 *
 * @param cwd - Repository directory.
 * @returns Tag names, empty when git fails.
 */
export function listTags(cwd?: string): string[] {
  let output: string
  try {
    output = runGit(['tag', '--sort=-creatordate'], cwd)
  } catch {
    return []
  }

  return output
    .split(/\r?\n/u)
    .map(line => line.trim())
    .filter(Boolean)
}
