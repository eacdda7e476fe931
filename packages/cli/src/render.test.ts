import { describe, expect, it } from 'vitest'
import {
  formatBlame,
  formatBranches,
  formatDiff,
  formatEntry,
  formatFetch,
  formatLog,
  formatProgress,
  formatPush,
  formatRemotes,
  formatStatus,
  formatSubmodules,
} from './render.js'

const SHA_A = 'a'.repeat(40)
const SHA_B = 'b'.repeat(40)

describe('formatStatus', () => {
  it('prints both status columns and rename sources', () => {
    expect(
      formatStatus([
        { path: 'README.md', index: ' ', worktree: 'M' },
        { path: 'new.ts', origPath: 'old.ts', index: 'R', worktree: ' ' },
      ])
    ).toEqual([' M README.md', 'R  old.ts -> new.ts'])
  })

  it('reports a clean tree', () => {
    expect(formatStatus([])).toEqual(['nothing to commit, working tree clean'])
  })
})

describe('formatLog', () => {
  it('prints one line per commit with its UTC date', () => {
    expect(
      formatLog([
        {
          id: SHA_A,
          shortId: 'aaaaaaa',
          author: 'Ada',
          email: 'ada@example.com',
          time: 1700000000,
          parents: [],
          subject: 'Initial import',
        },
      ])
    ).toEqual(['aaaaaaa 2023-11-14 Ada: Initial import'])
  })
})

describe('formatBranches', () => {
  it('marks HEAD and shows tracking state', () => {
    const base = { remote: false, target: SHA_A, subject: '', ahead: 0, behind: 0 }
    expect(
      formatBranches([
        { ...base, name: 'main', ref: 'refs/heads/main', head: true, upstream: 'origin/main', ahead: 2, behind: 1 },
        { ...base, name: 'topic', ref: 'refs/heads/topic', head: false, upstream: 'origin/topic' },
        { ...base, name: 'local', ref: 'refs/heads/local', head: false, upstream: null },
      ])
    ).toEqual(['* main [origin/main: ahead 2, behind 1]', '  topic [origin/topic]', '  local'])
  })
})

describe('formatRemotes', () => {
  it('shows a separate push url', () => {
    expect(
      formatRemotes([
        { name: 'origin', fetchUrl: 'https://git.example.com/app.git', pushUrl: 'ssh://git.example.com/app.git' },
        { name: 'mirror', fetchUrl: '/srv/mirror.git', pushUrl: '/srv/mirror.git' },
      ])
    ).toEqual(['origin https://git.example.com/app.git (push: ssh://git.example.com/app.git)', 'mirror /srv/mirror.git'])
  })
})

describe('formatDiff', () => {
  it('prints hunks with line prefixes', () => {
    expect(
      formatDiff({
        path: 'a.txt',
        staged: false,
        binary: false,
        untracked: false,
        additions: 1,
        deletions: 1,
        hunks: [
          {
            header: '@@ -1,2 +1,2 @@',
            oldStart: 1,
            oldLines: 2,
            newStart: 1,
            newLines: 2,
            lines: [
              { type: 'context', content: 'one', oldLineNo: 1, newLineNo: 1 },
              { type: 'delete', content: 'two', oldLineNo: 2, newLineNo: null },
              { type: 'add', content: 'deux', oldLineNo: null, newLineNo: 2 },
            ],
          },
        ],
      })
    ).toEqual(['a.txt (+1 -1)', '@@ -1,2 +1,2 @@', ' one', '-two', '+deux'])
  })

  it('prints one line for binary files', () => {
    expect(
      formatDiff({
        path: 'logo.png',
        staged: true,
        binary: true,
        untracked: false,
        additions: 0,
        deletions: 0,
        hunks: [],
      })
    ).toEqual(['Binary file logo.png differs'])
  })
})

describe('formatBlame', () => {
  it('pads line numbers to the widest one', () => {
    const line = { commit: SHA_A, author: 'Ada', authorTime: 0, summary: '' }
    const lines = Array.from({ length: 10 }, (_, i) => ({ ...line, lineNo: i + 1, content: `line ${i + 1}` }))

    const output = formatBlame(lines)

    expect(output[0]).toBe('aaaaaaaa  1 Ada: line 1')
    expect(output[9]).toBe('aaaaaaaa 10 Ada: line 10')
  })
})

describe('formatSubmodules', () => {
  it('prints the status mark, short commit and describe output', () => {
    expect(
      formatSubmodules([
        { name: 'lib', path: 'vendor/lib', url: null, id: SHA_B, status: 'out-of-sync', describe: 'v2.0.1' },
      ])
    ).toEqual(['+bbbbbbb vendor/lib (v2.0.1)'])
  })
})

describe('network summaries', () => {
  it('reports updated refs or that nothing changed', () => {
    expect(formatFetch({ remote: 'origin', updatedRefs: [] })).toEqual(['origin: already up to date'])
    expect(formatPush({ remote: 'origin', branch: 'main', updatedRefs: ['main'] })).toEqual([
      'origin main: updated main',
    ])
  })
})

describe('formatEntry', () => {
  it('dispatches on the entry kind', () => {
    expect(formatEntry({ kind: 'stash-list', payload: [], fingerprint: 'stash-list:{}', generation: 0, completedAt: 0 })).toEqual(
      ['no stash entries']
    )
    expect(
      formatEntry({
        kind: 'tags',
        payload: [
          { name: 'v1.0.0', target: SHA_A, annotation: null },
          { name: 'v1.1.0', target: SHA_B, annotation: 'Release 1.1' },
        ],
        fingerprint: 'tags:{}',
        generation: 3,
        completedAt: 0,
      })
    ).toEqual(['v1.0.0', 'v1.1.0  Release 1.1'])
  })
})

describe('formatProgress', () => {
  it('rounds to whole percent', () => {
    expect(formatProgress('fetch', 0.625)).toBe('fetch: 63%')
  })
})
