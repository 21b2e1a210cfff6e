import { beforeEach, describe, expect, it, vi } from 'vitest'

import { buildChangelog } from '../core/build-changelog'
import { runGit } from '../core/git/run-git'

vi.mock('../core/git/run-git', () => ({
  runGit: vi.fn(),
}))

/** Canned answers for the git commands the builder runs. */
interface FakeRepository {
  /** Output of `git log`, undefined to make it fail. */
  log?: string

  /** References that `git rev-parse` resolves. */
  refs: string[]

  /** Tags, newest first. */
  tags: string[]
}

/**
 * Create a `runGit` replacement backed by canned answers.
 *
 * @param repository - Canned repository state.
 * @returns Fake git runner.
 */
function fakeGit(repository: FakeRepository): (args: string[]) => string {
  return args => {
    let [command] = args
    if (command === 'tag') {
      return repository.tags.join('\n')
    }
    if (command === 'rev-parse') {
      let reference = args.at(-1)
      if (reference && repository.refs.includes(reference)) {
        return '3f2a9c1d'
      }
      throw new Error('Needed a single revision')
    }
    if (command === 'log' && repository.log !== undefined) {
      return repository.log
    }
    throw new Error(`git ${args.join(' ')} failed`)
  }
}

let log = [
  'abc123||Fix retry bug (#42)||Jane Doe',
  'def456||Merge pull request #10 from foo/bar||Bot',
  'ghi789||update docs||Sam',
].join('\n')

describe('buildChangelog', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('renders commits between the previous tag and the requested one', () => {
    vi.mocked(runGit).mockImplementation(
      fakeGit({
        refs: ['refs/tags/v1.1.0', 'refs/tags/v1.0.0', 'refs/heads/main'],
        tags: ['v1.1.0', 'v1.0.0'],
        log,
      }),
    )

    let result = buildChangelog({ tag: 'v1.1.0' })

    expect(result.section).toBe(
      [
        '## v1.1.0',
        '- Fix retry bug by Jane Doe ([#42](https://github.com/microsoft/durabletask-dotnet/pull/42))',
        '- Update docs by Sam ()',
      ].join('\n'),
    )
    expect(result.commits).toBe(3)
    expect(result.entries).toHaveLength(2)
    expect(result.range).toEqual({
      type: 'explicit',
      from: 'v1.0.0',
      to: 'v1.1.0',
    })
    expect(runGit).toHaveBeenCalledWith(
      ['log', 'v1.0.0..v1.1.0', '--pretty=format:%h||%s||%an'],
      undefined,
    )
  })

  it('reads the last 50 commits when no previous tag exists', () => {
    vi.mocked(runGit).mockImplementation(
      fakeGit({ refs: ['refs/tags/v1.0.0'], tags: ['v1.0.0'], log }),
    )

    let result = buildChangelog({ tag: 'v1.0.0', cwd: '/repo' })

    expect(result.range).toEqual({ type: 'capped', ref: 'v1.0.0', limit: 50 })
    expect(runGit).toHaveBeenCalledWith(
      ['log', 'v1.0.0', '-n', '50', '--pretty=format:%h||%s||%an'],
      '/repo',
    )
  })

  it('renders the placeholder when git log fails', () => {
    vi.mocked(runGit).mockImplementation(
      fakeGit({
        refs: ['refs/tags/v1.1.0'],
        tags: ['v1.1.0', 'v1.0.0'],
      }),
    )

    let result = buildChangelog({ tag: 'v1.1.0' })

    expect(result.section).toBe('## v1.1.0\n*(No commits found in range)*')
    expect(result.commits).toBe(0)
    expect(result.entries).toEqual([])
  })

  it('describes unreleased work on the branch for a missing tag', () => {
    vi.mocked(runGit).mockImplementation(
      fakeGit({
        log: 'abc123||add tracing (#5)||Ann',
        refs: ['refs/heads/main'],
        tags: ['v1.0.0'],
      }),
    )

    let result = buildChangelog({
      repositoryUrl: 'https://github.com/acme/tools',
      tag: 'v1.1.0',
    })

    expect(result.range).toEqual({
      type: 'branch-diff',
      from: 'v1.0.0',
      branch: 'main',
    })
    expect(result.section).toBe(
      '## v1.1.0\n- Add tracing by Ann ([#5](https://github.com/acme/tools/pull/5))',
    )
  })
})
