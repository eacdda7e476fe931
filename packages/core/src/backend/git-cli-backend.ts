import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { throwIfAborted } from '../cancellation.js'
import { GitCommandError, JobError } from '../errors.js'
import { createSpawnRunner, type GitCommandResult, type GitRunner, type GitRunOptions } from './git-runner.js'
import {
  BRANCH_FORMAT,
  countLines,
  FETCH_PHASES,
  isAuthFailure,
  LineStartCounter,
  LOG_FORMAT,
  parseBlamePorcelain,
  parseBranches,
  parseGitmodulesConfig,
  parseLog,
  parseRemotes,
  parseStashList,
  parseStatusPorcelain,
  parseSubmoduleStatus,
  parseTags,
  parseUnifiedDiff,
  parseUpdatedRefs,
  ProgressParser,
  PUSH_PHASES,
  RECORD_SEP,
  STASH_FORMAT,
  TAG_FORMAT,
} from './parsers.js'
import type {
  BackendCallContext,
  BlameLine,
  BlameParams,
  BranchInfo,
  CommitInfo,
  CredentialsCallback,
  DiffParams,
  FetchParams,
  FetchSummary,
  FileDiff,
  LogParams,
  MutationOp,
  PushParams,
  PushSummary,
  RemoteInfo,
  RepositoryBackend,
  StashEntry,
  StatusEntry,
  SubmoduleInfo,
  TagInfo,
} from './types.js'

/**
 * Inline credential helper answering git's `get` request from environment
 * variables set for the retried command only.
 */
const CREDENTIAL_HELPER_ARGS = [
  '-c',
  'credential.helper=',
  '-c',
  'credential.helper=!f() { test "$1" = get && echo "username=$GITVISTA_USERNAME" && echo "password=$GITVISTA_PASSWORD"; }; f',
]

export interface GitCliBackendOptions {
  /** Defaults to spawning `gitBinary` */
  runGit?: GitRunner
  gitBinary?: string
}

interface NetworkCommand {
  args: string[]
  remote: string
  phases: readonly string[]
}

/**
 * Repository backend driving the git executable.
 *
 * Every call runs in a child process bound to the job's abort signal, so a
 * cancelled job also stops its git process.
 */
export class GitCliBackend implements RepositoryBackend {
  private runGit: GitRunner

  constructor(
    private repoDir: string,
    options: GitCliBackendOptions = {}
  ) {
    this.runGit = options.runGit ?? createSpawnRunner(options.gitBinary)
  }

  async status(ctx: BackendCallContext): Promise<StatusEntry[]> {
    const { stdout } = await this.run(['status', '--porcelain=v1', '-z', '--untracked-files=all'], ctx)
    return parseStatusPorcelain(stdout)
  }

  async diff(params: DiffParams, ctx: BackendCallContext): Promise<FileDiff> {
    const untracked = !params.staged && (await this.isUntracked(params.path, ctx))
    const args = untracked
      ? ['diff', '--no-index', '--no-color', `-U${params.contextLines}`, '--', '/dev/null', params.path]
      : [
          'diff',
          ...(params.staged ? ['--cached'] : []),
          '--no-color',
          '--no-ext-diff',
          `-U${params.contextLines}`,
          '--',
          params.path,
        ]

    // --no-index exits 1 when the files differ
    const { stdout } = await this.run(args, ctx, { okExitCodes: untracked ? [1] : [] })
    throwIfAborted(ctx.signal)
    return { path: params.path, staged: params.staged, untracked, ...parseUnifiedDiff(stdout) }
  }

  async blame(params: BlameParams, ctx: BackendCallContext): Promise<BlameLine[]> {
    const total = await this.lineCount(params, ctx)
    const counter = new LineStartCounter('\t')
    const args = ['blame', '--line-porcelain', ...(params.revision ? [params.revision] : []), '--', params.path]

    const { stdout } = await this.run(args, ctx, {
      onStdout: (chunk) => {
        if (total > 0) ctx.onProgress(counter.push(chunk) / total)
      },
    })
    throwIfAborted(ctx.signal)
    const lines = parseBlamePorcelain(stdout)
    ctx.onProgress(1)
    return lines
  }

  async log(params: LogParams, ctx: BackendCallContext): Promise<CommitInfo[]> {
    const args = [
      'log',
      `--format=${LOG_FORMAT}`,
      `--max-count=${params.limit}`,
      `--skip=${params.skip}`,
      ...(params.author ? [`--author=${params.author}`] : []),
      params.range ?? 'HEAD',
      ...(params.path ? ['--', params.path] : []),
    ]

    let records = 0
    let result: GitCommandResult
    try {
      result = await this.run(args, ctx, {
        onStdout: (chunk) => {
          records += chunk.split(RECORD_SEP).length - 1
          ctx.onProgress(records / params.limit)
        },
      })
    } catch (error) {
      // Unborn branch: nothing to show yet
      if (error instanceof GitCommandError && /does not have any commits yet/.test(error.stderr)) {
        return []
      }
      throw error
    }

    throwIfAborted(ctx.signal)
    const commits = parseLog(result.stdout)
    ctx.onProgress(1)
    return commits
  }

  async tags(ctx: BackendCallContext): Promise<TagInfo[]> {
    const { stdout } = await this.run(['for-each-ref', `--format=${TAG_FORMAT}`, 'refs/tags'], ctx)
    return parseTags(stdout)
  }

  async branches(ctx: BackendCallContext): Promise<BranchInfo[]> {
    const { stdout } = await this.run(
      ['for-each-ref', `--format=${BRANCH_FORMAT}`, 'refs/heads', 'refs/remotes'],
      ctx
    )
    return parseBranches(stdout)
  }

  async remotes(ctx: BackendCallContext): Promise<RemoteInfo[]> {
    const { stdout } = await this.run(['remote', '-v'], ctx)
    return parseRemotes(stdout)
  }

  async stashList(ctx: BackendCallContext): Promise<StashEntry[]> {
    const { stdout } = await this.run(['stash', 'list', `--format=${STASH_FORMAT}`], ctx)
    return parseStashList(stdout)
  }

  async submodules(ctx: BackendCallContext): Promise<SubmoduleInfo[]> {
    // Exit code 1: no .gitmodules or no matching keys
    const config = await this.run(
      ['config', '--file', '.gitmodules', '--get-regexp', '^submodule\\..*\\.(path|url)$'],
      ctx,
      { okExitCodes: [1] }
    )
    if (config.exitCode === 1) return []

    const { stdout } = await this.run(['submodule', 'status'], ctx)
    return parseSubmoduleStatus(stdout, parseGitmodulesConfig(config.stdout))
  }

  async fetch(
    params: FetchParams,
    credentials: CredentialsCallback | undefined,
    ctx: BackendCallContext
  ): Promise<FetchSummary> {
    const result = await this.runNetwork(
      {
        args: ['fetch', '--progress', ...(params.prune ? ['--prune'] : []), params.remote],
        remote: params.remote,
        phases: FETCH_PHASES,
      },
      credentials,
      ctx
    )
    ctx.onProgress(1)
    return { remote: params.remote, updatedRefs: parseUpdatedRefs(result.stderr) }
  }

  async push(
    params: PushParams,
    credentials: CredentialsCallback | undefined,
    ctx: BackendCallContext
  ): Promise<PushSummary> {
    const result = await this.runNetwork(
      {
        args: [
          'push',
          '--progress',
          ...(params.force ? ['--force-with-lease'] : []),
          params.remote,
          params.branch,
        ],
        remote: params.remote,
        phases: PUSH_PHASES,
      },
      credentials,
      ctx
    )
    ctx.onProgress(1)
    return {
      remote: params.remote,
      branch: params.branch,
      updatedRefs: parseUpdatedRefs(result.stderr),
    }
  }

  async mutate(op: MutationOp, ctx: BackendCallContext): Promise<void> {
    await this.run(mutationArgs(op), ctx)
  }

  private run(args: string[], ctx: BackendCallContext, options: GitRunOptions = {}): Promise<GitCommandResult> {
    throwIfAborted(ctx.signal)
    return this.runGit(this.repoDir, args, { ...options, signal: ctx.signal })
  }

  /**
   * Run fetch or push, asking for credentials once when the remote rejects
   * the anonymous attempt.
   */
  private async runNetwork(
    command: NetworkCommand,
    credentials: CredentialsCallback | undefined,
    ctx: BackendCallContext
  ): Promise<GitCommandResult> {
    const attempt = (prefix: string[], env?: NodeJS.ProcessEnv) => {
      const progress = new ProgressParser(command.phases)
      return this.run([...prefix, ...command.args], ctx, {
        env,
        onStderr: (chunk) => {
          const fraction = progress.push(chunk)
          if (fraction !== null) ctx.onProgress(fraction)
        },
      })
    }

    try {
      return await attempt([])
    } catch (error) {
      if (!(error instanceof GitCommandError) || !isAuthFailure(error.stderr)) throw error

      if (!credentials) {
        throw new JobError('credentials-required', `${command.remote} requires authentication`, { cause: error })
      }
      const url = await this.remoteUrl(command.remote, ctx)
      const answer = await credentials({ remote: command.remote, url, attempt: 1 })
      if (!answer) {
        throw new JobError('credentials-required', `No credentials provided for ${command.remote}`, { cause: error })
      }

      try {
        return await attempt(CREDENTIAL_HELPER_ARGS, {
          GITVISTA_USERNAME: answer.username,
          GITVISTA_PASSWORD: answer.password,
        })
      } catch (retryError) {
        if (retryError instanceof GitCommandError && isAuthFailure(retryError.stderr)) {
          throw new JobError('credentials-rejected', `${command.remote} rejected the credentials`, {
            cause: retryError,
          })
        }
        throw retryError
      }
    }
  }

  private async remoteUrl(remote: string, ctx: BackendCallContext): Promise<string | null> {
    try {
      const { stdout } = await this.run(['remote', 'get-url', remote], ctx)
      return stdout.trim() || null
    } catch (error) {
      if (error instanceof GitCommandError) return null
      throw error
    }
  }

  private async isUntracked(path: string, ctx: BackendCallContext): Promise<boolean> {
    const { exitCode } = await this.run(['ls-files', '--error-unmatch', '--', path], ctx, { okExitCodes: [1] })
    return exitCode === 1
  }

  /** Line count of the blamed content, 0 when unknown */
  private async lineCount(params: BlameParams, ctx: BackendCallContext): Promise<number> {
    try {
      if (params.revision) {
        const { stdout } = await this.run(['show', `${params.revision}:${params.path}`], ctx)
        return countLines(stdout)
      }
      return countLines(await readFile(join(this.repoDir, params.path), 'utf-8'))
    } catch (error) {
      if (error instanceof GitCommandError || (error instanceof Error && 'code' in error)) return 0
      throw error
    }
  }
}

export function mutationArgs(op: MutationOp): string[] {
  switch (op.type) {
    case 'stage':
      return ['add', '--', ...requirePaths(op.paths)]
    case 'unstage':
      return ['restore', '--staged', '--', ...requirePaths(op.paths)]
    case 'discard':
      return ['restore', '--', ...requirePaths(op.paths)]
    case 'commit':
      return ['commit', ...(op.amend ? ['--amend'] : []), '-m', op.message]
    case 'checkout':
      return ['checkout', requireRef(op.branch)]
    case 'create-branch':
      return ['branch', requireRef(op.name), ...(op.startPoint ? [requireRef(op.startPoint)] : [])]
    case 'merge':
      return ['merge', '--no-edit', requireRef(op.branch)]
    case 'rebase':
      return ['rebase', requireRef(op.onto)]
    case 'stash-save':
      return [
        'stash',
        'push',
        ...(op.includeUntracked ? ['--include-untracked'] : []),
        ...(op.message ? ['-m', op.message] : []),
      ]
    case 'stash-pop':
      return ['stash', 'pop', `stash@{${op.index}}`]
    case 'stash-drop':
      return ['stash', 'drop', `stash@{${op.index}}`]
  }
}

function requirePaths(paths: string[]): string[] {
  if (paths.length === 0) {
    throw new JobError('backend-failure', 'No paths given')
  }
  return paths
}

/** Refs go to git as positional arguments; a leading dash would read as an option */
function requireRef(ref: string): string {
  if (ref.length === 0 || ref.startsWith('-')) {
    throw new JobError('backend-failure', `Invalid ref: ${JSON.stringify(ref)}`)
  }
  return ref
}
