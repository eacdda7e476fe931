import type {
  BlameLine,
  BranchInfo,
  CacheEntry,
  CommitInfo,
  FetchSummary,
  FileDiff,
  JobKind,
  PushSummary,
  RemoteInfo,
  StashEntry,
  StatusEntry,
  SubmoduleInfo,
  SubmoduleStatus,
  TagInfo,
} from '@gitvista/core'

export function formatStatus(entries: StatusEntry[]): string[] {
  if (entries.length === 0) return ['nothing to commit, working tree clean']
  return entries.map((entry) => {
    const path = entry.origPath ? `${entry.origPath} -> ${entry.path}` : entry.path
    return `${entry.index}${entry.worktree} ${path}`
  })
}

/** Commit dates are printed in UTC */
function formatDate(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString().slice(0, 10)
}

export function formatLog(commits: CommitInfo[]): string[] {
  return commits.map((commit) => `${commit.shortId} ${formatDate(commit.time)} ${commit.author}: ${commit.subject}`)
}

function formatTracking(branch: BranchInfo): string {
  if (!branch.upstream) return ''
  const parts: string[] = []
  if (branch.ahead > 0) parts.push(`ahead ${branch.ahead}`)
  if (branch.behind > 0) parts.push(`behind ${branch.behind}`)
  return parts.length > 0 ? ` [${branch.upstream}: ${parts.join(', ')}]` : ` [${branch.upstream}]`
}

export function formatBranches(branches: BranchInfo[]): string[] {
  return branches.map((branch) => `${branch.head ? '*' : ' '} ${branch.name}${formatTracking(branch)}`)
}

export function formatTags(tags: TagInfo[]): string[] {
  return tags.map((tag) => (tag.annotation ? `${tag.name}  ${tag.annotation}` : tag.name))
}

export function formatRemotes(remotes: RemoteInfo[]): string[] {
  return remotes.map((remote) => {
    const fetchUrl = remote.fetchUrl ?? ''
    if (remote.pushUrl && remote.pushUrl !== remote.fetchUrl) {
      return `${remote.name} ${fetchUrl} (push: ${remote.pushUrl})`
    }
    return `${remote.name} ${fetchUrl}`
  })
}

export function formatStashes(entries: StashEntry[]): string[] {
  if (entries.length === 0) return ['no stash entries']
  return entries.map((entry) => `${entry.ref}: ${entry.message}`)
}

const SUBMODULE_MARKS: Record<SubmoduleStatus, string> = {
  clean: ' ',
  uninitialized: '-',
  'out-of-sync': '+',
  conflicted: 'U',
}

export function formatSubmodules(submodules: SubmoduleInfo[]): string[] {
  return submodules.map((submodule) => {
    const describe = submodule.describe ? ` (${submodule.describe})` : ''
    return `${SUBMODULE_MARKS[submodule.status]}${submodule.id.slice(0, 7)} ${submodule.path}${describe}`
  })
}

const DIFF_PREFIX = { context: ' ', add: '+', delete: '-' } as const

export function formatDiff(diff: FileDiff): string[] {
  if (diff.binary) return [`Binary file ${diff.path} differs`]
  if (diff.hunks.length === 0) return [`${diff.path}: no changes`]

  const lines = [`${diff.path} (+${diff.additions} -${diff.deletions})`]
  for (const hunk of diff.hunks) {
    lines.push(hunk.header)
    for (const line of hunk.lines) {
      lines.push(`${DIFF_PREFIX[line.type]}${line.content}`)
    }
  }
  return lines
}

export function formatBlame(lines: BlameLine[]): string[] {
  const width = String(lines.length).length
  return lines.map(
    (line) => `${line.commit.slice(0, 8)} ${String(line.lineNo).padStart(width)} ${line.author}: ${line.content}`
  )
}

export function formatFetch(summary: FetchSummary): string[] {
  if (summary.updatedRefs.length === 0) return [`${summary.remote}: already up to date`]
  return summary.updatedRefs.map((ref) => `${summary.remote}: updated ${ref}`)
}

export function formatPush(summary: PushSummary): string[] {
  const target = `${summary.remote} ${summary.branch}`
  if (summary.updatedRefs.length === 0) return [`${target}: everything up to date`]
  return summary.updatedRefs.map((ref) => `${target}: updated ${ref}`)
}

export function formatEntry(entry: CacheEntry): string[] {
  switch (entry.kind) {
    case 'status':
      return formatStatus(entry.payload)
    case 'diff':
      return formatDiff(entry.payload)
    case 'blame':
      return formatBlame(entry.payload)
    case 'log':
      return formatLog(entry.payload)
    case 'tags':
      return formatTags(entry.payload)
    case 'branches':
      return formatBranches(entry.payload)
    case 'remotes':
      return formatRemotes(entry.payload)
    case 'fetch':
      return formatFetch(entry.payload)
    case 'push':
      return formatPush(entry.payload)
    case 'stash-list':
      return formatStashes(entry.payload)
    case 'submodules':
      return formatSubmodules(entry.payload)
  }
}

export function formatProgress(kind: JobKind, fraction: number): string {
  return `${kind}: ${Math.round(fraction * 100)}%`
}
