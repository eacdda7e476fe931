import type {
  BlameLine,
  BranchInfo,
  CommitInfo,
  DiffHunk,
  DiffLine,
  RemoteInfo,
  StashEntry,
  StatusCode,
  StatusEntry,
  SubmoduleInfo,
  SubmoduleStatus,
  TagInfo,
} from './types.js'

/** Field separator used in every custom format string */
export const FIELD_SEP = '\u001f'
/** Record separator used by `git log` formats */
export const RECORD_SEP = '\u001e'

const STATUS_CODES: ReadonlySet<string> = new Set([' ', 'M', 'T', 'A', 'D', 'R', 'C', 'U', '?', '!'])

function isStatusCode(value: string): value is StatusCode {
  return STATUS_CODES.has(value)
}

function toStatusCode(value: string | undefined): StatusCode {
  return value !== undefined && isStatusCode(value) ? value : ' '
}

/**
 * Parse `git status --porcelain=v1 -z`.
 *
 * Records are NUL-terminated `XY path`; renames and copies carry their source
 * path in the following record.
 */
export function parseStatusPorcelain(output: string): StatusEntry[] {
  const entries: StatusEntry[] = []
  const records = output.split('\0')

  for (let i = 0; i < records.length; i++) {
    const record = records[i]
    if (!record || record.length < 4) continue

    const index = toStatusCode(record[0])
    const worktree = toStatusCode(record[1])
    const entry: StatusEntry = { path: record.slice(3), index, worktree }

    if (index === 'R' || index === 'C') {
      const origPath = records[i + 1]
      if (origPath) entry.origPath = origPath
      i += 1
    }
    entries.push(entry)
  }

  return entries
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/

export interface ParsedDiff {
  binary: boolean
  additions: number
  deletions: number
  hunks: DiffHunk[]
}

/**
 * Parse unified diff output of a single file.
 */
export function parseUnifiedDiff(output: string): ParsedDiff {
  const hunks: DiffHunk[] = []
  let current: DiffHunk | null = null
  let oldLineNo = 0
  let newLineNo = 0
  let additions = 0
  let deletions = 0
  let binary = false

  for (const line of output.split('\n')) {
    const header = HUNK_HEADER.exec(line)
    if (header) {
      oldLineNo = Number(header[1])
      newLineNo = Number(header[3])
      current = {
        header: line,
        oldStart: oldLineNo,
        oldLines: header[2] === undefined ? 1 : Number(header[2]),
        newStart: newLineNo,
        newLines: header[4] === undefined ? 1 : Number(header[4]),
        lines: [],
      }
      hunks.push(current)
      continue
    }

    if (!current) {
      if (line.startsWith('Binary files ') || line === 'GIT binary patch') binary = true
      continue
    }

    let diffLine: DiffLine | null = null
    if (line.startsWith('+')) {
      diffLine = { type: 'add', content: line.slice(1), oldLineNo: null, newLineNo: newLineNo++ }
      additions += 1
    } else if (line.startsWith('-')) {
      diffLine = { type: 'delete', content: line.slice(1), oldLineNo: oldLineNo++, newLineNo: null }
      deletions += 1
    } else if (line.startsWith(' ')) {
      diffLine = { type: 'context', content: line.slice(1), oldLineNo: oldLineNo++, newLineNo: newLineNo++ }
    }
    // '\ No newline at end of file' and the trailing empty line carry no content

    if (diffLine) current.lines.push(diffLine)
  }

  return { binary, additions, deletions, hunks }
}

/**
 * Parse `git blame --line-porcelain`.
 *
 * Every line block starts with `<sha> <orig> <final> [<count>]`, lists the
 * commit headers and ends with the tab-prefixed content.
 */
export function parseBlamePorcelain(output: string): BlameLine[] {
  const lines: BlameLine[] = []
  let commit = ''
  let finalLine = 0
  let author = ''
  let authorTime = 0
  let summary = ''

  for (const line of output.split('\n')) {
    if (line.startsWith('\t')) {
      lines.push({ lineNo: finalLine, commit, author, authorTime, summary, content: line.slice(1) })
      continue
    }

    const header = /^([0-9a-f]{40}|[0-9a-f]{64}) \d+ (\d+)/.exec(line)
    if (header?.[1] && header[2]) {
      commit = header[1]
      finalLine = Number(header[2])
      continue
    }

    if (line.startsWith('author ')) {
      author = line.slice('author '.length)
    } else if (line.startsWith('author-time ')) {
      authorTime = Number(line.slice('author-time '.length)) || 0
    } else if (line.startsWith('summary ')) {
      summary = line.slice('summary '.length)
    }
  }

  return lines
}

/** `git log` format matching {@link parseLog} */
export const LOG_FORMAT = ['%H', '%h', '%an', '%ae', '%at', '%P', '%s'].join('%x1f') + '%x1e'

export function parseLog(output: string): CommitInfo[] {
  const commits: CommitInfo[] = []

  for (const raw of output.split(RECORD_SEP)) {
    const record = raw.replace(/^\n/, '')
    if (!record.trim()) continue
    const [id, shortId = '', author = '', email = '', time = '0', parents = '', subject = ''] =
      record.split(FIELD_SEP)
    if (!id) continue

    commits.push({
      id,
      shortId,
      author,
      email,
      time: Number(time) || 0,
      parents: parents.split(' ').filter(Boolean),
      subject,
    })
  }

  return commits
}

/** `for-each-ref` format matching {@link parseTags} */
export const TAG_FORMAT = [
  '%(refname:short)',
  '%(objectname)',
  '%(*objectname)',
  '%(objecttype)',
  '%(contents:subject)',
].join('%1f')

export function parseTags(output: string): TagInfo[] {
  const tags: TagInfo[] = []

  for (const line of output.split('\n')) {
    if (!line.trim()) continue
    const [name, objectId = '', peeledId = '', objectType = '', subject = ''] = line.split(FIELD_SEP)
    if (!name) continue

    const annotated = objectType === 'tag'
    tags.push({
      name,
      target: annotated && peeledId ? peeledId : objectId,
      annotation: annotated ? subject : null,
    })
  }

  return tags
}

/** `for-each-ref` format matching {@link parseBranches} */
export const BRANCH_FORMAT = [
  '%(refname)',
  '%(refname:short)',
  '%(objectname)',
  '%(upstream:short)',
  '%(upstream:track,nobracket)',
  '%(HEAD)',
  '%(contents:subject)',
].join('%1f')

function parseTrack(track: string): { ahead: number; behind: number } {
  const ahead = Number(/ahead (\d+)/.exec(track)?.[1] ?? 0)
  const behind = Number(/behind (\d+)/.exec(track)?.[1] ?? 0)
  return { ahead, behind }
}

export function parseBranches(output: string): BranchInfo[] {
  const branches: BranchInfo[] = []

  for (const line of output.split('\n')) {
    if (!line.trim()) continue
    const [ref, name = '', target = '', upstream = '', track = '', head = '', subject = ''] =
      line.split(FIELD_SEP)
    // refs/remotes/<remote>/HEAD is a symbolic pointer, not a branch
    if (!ref || ref.endsWith('/HEAD')) continue

    branches.push({
      name,
      ref,
      remote: ref.startsWith('refs/remotes/'),
      head: head === '*',
      target,
      upstream: upstream || null,
      ...parseTrack(track),
      subject,
    })
  }

  return branches
}

/**
 * Parse `git remote -v`: `<name>\t<url> (fetch|push)`.
 */
export function parseRemotes(output: string): RemoteInfo[] {
  const remotes = new Map<string, RemoteInfo>()

  for (const line of output.split('\n')) {
    const match = /^(\S+)\t(.+) \((fetch|push)\)$/.exec(line.trim())
    if (!match?.[1] || !match[2]) continue

    const name = match[1]
    const remote = remotes.get(name) ?? { name, fetchUrl: null, pushUrl: null }
    if (match[3] === 'fetch') remote.fetchUrl = match[2]
    else remote.pushUrl = match[2]
    remotes.set(name, remote)
  }

  return [...remotes.values()]
}

/** `git stash list` format matching {@link parseStashList} */
export const STASH_FORMAT = ['%gd', '%H', '%gs'].join('%x1f')

export function parseStashList(output: string): StashEntry[] {
  const entries: StashEntry[] = []

  for (const line of output.split('\n')) {
    if (!line.trim()) continue
    const [ref, id = '', message = ''] = line.split(FIELD_SEP)
    const index = /^stash@\{(\d+)\}$/.exec(ref ?? '')?.[1]
    if (!ref || index === undefined) continue
    entries.push({ index: Number(index), ref, id, message })
  }

  return entries
}

function submoduleStatus(flag: string): SubmoduleStatus {
  switch (flag) {
    case '-':
      return 'uninitialized'
    case '+':
      return 'out-of-sync'
    case 'U':
      return 'conflicted'
    default:
      return 'clean'
  }
}

export interface SubmoduleConfig {
  name: string
  url: string | null
}

/**
 * Parse `git config --file .gitmodules --get-regexp` output into a map keyed
 * by submodule path.
 */
export function parseGitmodulesConfig(output: string): Map<string, SubmoduleConfig> {
  const byName = new Map<string, { path?: string; url?: string }>()

  for (const line of output.split('\n')) {
    const match = /^submodule\.(.+)\.(path|url) (.*)$/.exec(line.trim())
    if (!match?.[1]) continue
    const item = byName.get(match[1]) ?? {}
    if (match[2] === 'path') item.path = match[3]
    else item.url = match[3]
    byName.set(match[1], item)
  }

  const byPath = new Map<string, SubmoduleConfig>()
  for (const [name, item] of byName) {
    byPath.set(item.path ?? name, { name, url: item.url ?? null })
  }
  return byPath
}

/**
 * Parse `git submodule status`: `<flag><sha> <path>[ (<describe>)]`.
 */
export function parseSubmoduleStatus(output: string, config: Map<string, SubmoduleConfig>): SubmoduleInfo[] {
  const submodules: SubmoduleInfo[] = []

  for (const line of output.split('\n')) {
    const match = /^([ +\-U])([0-9a-f]+) (.+?)(?: \((.*)\))?$/.exec(line)
    if (!match?.[2] || !match[3]) continue

    const path = match[3]
    const known = config.get(path)
    submodules.push({
      name: known?.name ?? path,
      path,
      url: known?.url ?? null,
      id: match[2],
      status: submoduleStatus(match[1] ?? ' '),
      describe: match[4] ?? null,
    })
  }

  return submodules
}

/**
 * Parse the ref update table git prints on stderr after fetch and push,
 * returning the local side of every updated ref.
 */
export function parseUpdatedRefs(stderr: string): string[] {
  const refs: string[] = []

  for (const line of stderr.split(/\r?\n/)) {
    // Flags: ' ' fast-forward, '+' forced, '*' new, '-' deleted, 't' tag; '!' and '=' are skipped
    const match = /^ [ +*\-t] +\S.*? +\S+ +-> (\S+)/.exec(line)
    if (match?.[1]) refs.push(match[1])
  }

  return refs
}

const AUTH_FAILURE_PATTERNS = [
  /authentication failed/i,
  /could not read username/i,
  /could not read password/i,
  /terminal prompts disabled/i,
  /invalid username or password/i,
  /permission denied \(publickey/i,
  /http basic: access denied/i,
]

export function isAuthFailure(stderr: string): boolean {
  return AUTH_FAILURE_PATTERNS.some((pattern) => pattern.test(stderr))
}

/**
 * Turns the phase percentages git writes to stderr into one overall
 * fraction. Each phase counts for an equal share.
 */
export class ProgressParser {
  private buffer = ''

  constructor(private phases: readonly string[]) {}

  /** @returns the latest overall fraction seen in `chunk`, or null */
  push(chunk: string): number | null {
    this.buffer += chunk
    const parts = this.buffer.split(/[\r\n]/)
    this.buffer = parts.pop() ?? ''

    let fraction: number | null = null
    for (const part of parts) {
      const value = this.parseLine(part)
      if (value !== null) fraction = value
    }
    return fraction
  }

  private parseLine(line: string): number | null {
    const match = /^(?:remote: )?([A-Za-z ]+):\s+(\d{1,3})%/.exec(line.trim())
    if (!match?.[1] || !match[2]) return null

    const phase = this.phases.indexOf(match[1].trim())
    if (phase < 0) return null

    const percent = Math.min(100, Number(match[2]))
    return (phase + percent / 100) / this.phases.length
  }
}

export const FETCH_PHASES = ['Counting objects', 'Compressing objects', 'Receiving objects', 'Resolving deltas']
export const PUSH_PHASES = ['Enumerating objects', 'Counting objects', 'Compressing objects', 'Writing objects']

/**
 * Count lines that start with `prefix` across arbitrary chunk boundaries.
 */
export class LineStartCounter {
  private atLineStart = true
  private total = 0

  constructor(private prefix: string) {}

  get count(): number {
    return this.total
  }

  push(chunk: string): number {
    for (let i = 0; i < chunk.length; i++) {
      const ch = chunk[i]
      if (this.atLineStart && ch === this.prefix) this.total += 1
      this.atLineStart = ch === '\n'
    }
    return this.total
  }
}

export function countLines(content: string): number {
  if (content.length === 0) return 0
  const newlines = content.split('\n').length - 1
  return content.endsWith('\n') ? newlines : newlines + 1
}
