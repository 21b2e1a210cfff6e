import { runGit } from './run-git'

/**
 * Check whether a fully qualified reference exists.
 *
 * @param reference - Reference such as `refs/tags/v1.0.0`.
 * @param cwd - Repository directory.
 * @returns True when git resolves the reference.
 */
export function hasReference(reference: string, cwd?: string): boolean {
  try {
    return runGit(['rev-parse', '--verify', '--quiet', reference], cwd) !== ''
  } catch {
    return false
  }
}
