import { describe, expect, it, vi } from 'vitest'

import { hasReference } from '../../core/git/has-reference'
import { runGit } from '../../core/git/run-git'

vi.mock('../../core/git/run-git', () => ({
  runGit: vi.fn(),
}))

describe('hasReference', () => {
  it('returns true when git resolves the reference', () => {
    vi.mocked(runGit).mockReturnValue('3f2a9c1d')

    expect(hasReference('refs/tags/v1.0.0', '/repo')).toBeTruthy()
    expect(runGit).toHaveBeenCalledWith(
      ['rev-parse', '--verify', '--quiet', 'refs/tags/v1.0.0'],
      '/repo',
    )
  })

  it('returns false for empty output', () => {
    vi.mocked(runGit).mockReturnValue('')

    expect(hasReference('refs/heads/main')).toBeFalsy()
  })

  it('returns false when git exits with an error', () => {
    vi.mocked(runGit).mockImplementation(() => {
      throw new Error('exit code 1')
    })

    expect(hasReference('refs/tags/missing')).toBeFalsy()
  })
})
