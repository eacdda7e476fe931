/**
 * Repository backend contract and the payloads it produces.
 *
 * The engine never talks to git directly: every query and mutation goes
 * through a {@link RepositoryBackend}, which the worker calls off the
 * interactive loop.
 */

/** Single-letter status code as printed by `git status --porcelain=v1` */
export type StatusCode = ' ' | 'M' | 'T' | 'A' | 'D' | 'R' | 'C' | 'U' | '?' | '!'

export interface StatusEntry {
  path: string
  /** Source path of a rename or copy */
  origPath?: string
  index: StatusCode
  worktree: StatusCode
}

export type DiffLineType = 'context' | 'add' | 'delete'

export interface DiffLine {
  type: DiffLineType
  content: string
  oldLineNo: number | null
  newLineNo: number | null
}

export interface DiffHunk {
  header: string
  oldStart: number
  oldLines: number
  newStart: number
  newLines: number
  lines: DiffLine[]
}

export interface FileDiff {
  path: string
  staged: boolean
  binary: boolean
  untracked: boolean
  additions: number
  deletions: number
  hunks: DiffHunk[]
}

export interface BlameLine {
  lineNo: number
  commit: string
  author: string
  authorTime: number
  summary: string
  content: string
}

export interface CommitInfo {
  id: string
  shortId: string
  author: string
  email: string
  time: number
  parents: string[]
  subject: string
}

export interface TagInfo {
  name: string
  /** Commit the tag points at, peeled through annotated tag objects */
  target: string
  annotation: string | null
}

export interface BranchInfo {
  name: string
  ref: string
  remote: boolean
  head: boolean
  target: string
  upstream: string | null
  ahead: number
  behind: number
  subject: string
}

export interface RemoteInfo {
  name: string
  fetchUrl: string | null
  pushUrl: string | null
}

export interface StashEntry {
  index: number
  ref: string
  id: string
  message: string
}

export type SubmoduleStatus = 'clean' | 'uninitialized' | 'out-of-sync' | 'conflicted'

export interface SubmoduleInfo {
  name: string
  path: string
  url: string | null
  /** Commit recorded in the superproject */
  id: string
  status: SubmoduleStatus
  describe: string | null
}

export interface FetchSummary {
  remote: string
  updatedRefs: string[]
}

export interface PushSummary {
  remote: string
  branch: string
  updatedRefs: string[]
}

export interface Credentials {
  username: string
  password: string
}

export interface CredentialsRequest {
  remote: string
  url: string | null
  attempt: number
}

/**
 * Asked when the backend needs authentication. Answering `null` means the
 * user declined to provide credentials.
 */
export type CredentialsCallback = (request: CredentialsRequest) => Promise<Credentials | null>

export interface BackendCallContext {
  /** Raised when the job is superseded, timed out or the engine is disposed */
  signal: AbortSignal
  /** Fraction in [0, 1]; the worker throttles these before they reach the consumer */
  onProgress: (fraction: number) => void
}

export interface DiffParams {
  path: string
  staged: boolean
  contextLines: number
}

export interface BlameParams {
  path: string
  revision?: string
}

export interface LogParams {
  range?: string
  author?: string
  path?: string
  limit: number
  skip: number
}

export interface FetchParams {
  remote: string
  prune: boolean
}

export interface PushParams {
  remote: string
  branch: string
  force: boolean
}

/** Operations that change repository state */
export type MutationOp =
  | { type: 'stage'; paths: string[] }
  | { type: 'unstage'; paths: string[] }
  | { type: 'discard'; paths: string[] }
  | { type: 'commit'; message: string; amend?: boolean }
  | { type: 'checkout'; branch: string }
  | { type: 'create-branch'; name: string; startPoint?: string }
  | { type: 'merge'; branch: string }
  | { type: 'rebase'; onto: string }
  | { type: 'stash-save'; message?: string; includeUntracked?: boolean }
  | { type: 'stash-pop'; index: number }
  | { type: 'stash-drop'; index: number }

export type MutationType = MutationOp['type']

export interface RepositoryBackend {
  status(ctx: BackendCallContext): Promise<StatusEntry[]>
  diff(params: DiffParams, ctx: BackendCallContext): Promise<FileDiff>
  blame(params: BlameParams, ctx: BackendCallContext): Promise<BlameLine[]>
  log(params: LogParams, ctx: BackendCallContext): Promise<CommitInfo[]>
  tags(ctx: BackendCallContext): Promise<TagInfo[]>
  branches(ctx: BackendCallContext): Promise<BranchInfo[]>
  remotes(ctx: BackendCallContext): Promise<RemoteInfo[]>
  stashList(ctx: BackendCallContext): Promise<StashEntry[]>
  submodules(ctx: BackendCallContext): Promise<SubmoduleInfo[]>
  fetch(
    params: FetchParams,
    credentials: CredentialsCallback | undefined,
    ctx: BackendCallContext
  ): Promise<FetchSummary>
  push(
    params: PushParams,
    credentials: CredentialsCallback | undefined,
    ctx: BackendCallContext
  ): Promise<PushSummary>
  mutate(op: MutationOp, ctx: BackendCallContext): Promise<void>
}
