import {
  ConfigManager,
  DebouncedInvalidator,
  GitCliBackend,
  JobError,
  QueryEngine,
  RepositoryWatcher,
  type CacheEntryOf,
  type CredentialsCallback,
  type EngineConfig,
  type JobKind,
  type JobSpecInput,
  type MutationOp,
  type RepositoryBackend,
  type SubscribeFn,
} from '@gitvista/core'
import { resolve } from 'node:path'
import yargs, { type Argv } from 'yargs'
import { formatEntry, formatProgress } from './render.js'

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
  /** Live progress of network and long-running queries */
  progress: (kind: JobKind, fraction: number) => void
}

export interface CliOptions {
  io?: CliIO
  env?: NodeJS.ProcessEnv
  /** Base for a relative `--dir` */
  cwd?: string
  createBackend?: (repoDir: string, config: EngineConfig) => RepositoryBackend
  /** Watcher subscription used by `watch` */
  subscribe?: SubscribeFn
  /** Stops `watch` */
  signal?: AbortSignal
}

export interface Session {
  repoDir: string
  config: EngineConfig
  engine: QueryEngine
}

interface GlobalArgs {
  dir: string
  debounce: number | undefined
  timeout: number | undefined
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  progress: (kind, fraction) => {
    if (!process.stderr.isTTY) return
    process.stderr.write(`\r${formatProgress(kind, fraction)}${fraction >= 1 ? '\n' : ''}`)
  },
}

/**
 * Credentials for fetch and push, taken from `GITVISTA_USERNAME` and
 * `GITVISTA_PASSWORD`. Undefined when either is missing.
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv): CredentialsCallback | undefined {
  const username = env.GITVISTA_USERNAME
  const password = env.GITVISTA_PASSWORD
  if (!username || !password) return undefined
  return async () => ({ username, password })
}

export async function openSession(
  repoDir: string,
  overrides: Partial<EngineConfig>,
  options: CliOptions = {}
): Promise<Session> {
  const env = options.env ?? process.env
  const config = await new ConfigManager(repoDir, env).load(overrides)
  const backend = options.createBackend
    ? options.createBackend(repoDir, config)
    : new GitCliBackend(repoDir, { gitBinary: config.gitBinary })
  const engine = new QueryEngine({ backend, config, credentials: credentialsFromEnv(env) })
  return { repoDir, config, engine }
}

/**
 * Submit one query and wait for it to settle.
 * Rejects with the {@link JobError} of a `failed` notification.
 */
export async function runQuery<K extends JobKind>(
  engine: QueryEngine,
  input: JobSpecInput & { kind: K },
  onProgress: (fraction: number) => void = () => {}
): Promise<CacheEntryOf<K>> {
  const request = engine.submit(input)

  for (;;) {
    await Promise.race([engine.whenIdle(), engine.notifications.wait()])
    for (const event of engine.notifications.drain()) {
      if (event.kind !== input.kind) continue
      if (event.type === 'progress') onProgress(event.fraction)
      if (event.type === 'failed') throw new JobError(event.error, event.message)
    }
    if (engine.isIdle) break
  }

  const entry = engine.cache.get(input.kind, request.fingerprint)
  if (!entry) {
    throw new JobError('cancelled', `${input.kind} did not complete`)
  }
  return entry
}

export interface WatchOptions {
  io: CliIO
  signal?: AbortSignal
  subscribe?: SubscribeFn
}

/**
 * Keep status and branches fresh until the signal aborts, printing every
 * update.
 */
export async function watchRepository(session: Session, options: WatchOptions): Promise<void> {
  const { engine, config } = session
  const { io, signal } = options

  const invalidator = new DebouncedInvalidator({
    debounceMs: config.debounceMs,
    onFire: () => {
      engine.invalidate('watcher')
    },
  })
  const watcher = new RepositoryWatcher(session.repoDir, {
    onSignal: () => invalidator.signal(),
    ignore: config.watchIgnore,
    pollIntervalMs: config.pollIntervalMs,
    subscribe: options.subscribe,
  })

  try {
    await watcher.start()
    engine.submit({ kind: 'status' })
    engine.submit({ kind: 'branches' })

    for await (const batch of engine.notifications.stream(signal)) {
      for (const event of batch) {
        if (event.type === 'data-ready') {
          const entry = engine.cache.latest(event.kind)
          if (!entry) continue
          io.out(`== ${event.kind} (generation ${entry.generation})`)
          for (const line of formatEntry(entry)) io.out(line)
        } else if (event.type === 'failed') {
          io.err(`${event.kind} failed (${event.error}): ${event.message}`)
        }
      }
    }
  } finally {
    invalidator.dispose()
    await watcher.close()
  }
}

function withGlobals(parser: Argv) {
  return parser
    .option('dir', {
      alias: 'd',
      describe: 'Repository directory',
      type: 'string',
      default: '.',
    })
    .option('debounce', {
      describe: 'Quiet period before a refresh, in milliseconds',
      type: 'number',
    })
    .option('timeout', {
      describe: 'Fetch and push timeout, in milliseconds',
      type: 'number',
    })
}

function toOverrides(argv: GlobalArgs): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {}
  if (argv.debounce !== undefined) overrides.debounceMs = argv.debounce
  if (argv.timeout !== undefined) overrides.networkTimeoutMs = argv.timeout
  return overrides
}

/**
 * Run the command line with `args` (without the node and script entries).
 * @returns the process exit code
 */
export async function runCli(args: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO
  const cwd = options.cwd ?? process.cwd()

  const withSession = async (argv: GlobalArgs, task: (session: Session) => Promise<void>) => {
    const session = await openSession(resolve(cwd, argv.dir), toOverrides(argv), options)
    try {
      await task(session)
    } finally {
      await session.engine.dispose()
    }
  }

  const query = async (argv: GlobalArgs, input: JobSpecInput) => {
    await withSession(argv, async ({ engine }) => {
      const entry = await runQuery(engine, input, (fraction) => io.progress(input.kind, fraction))
      for (const line of formatEntry(entry)) io.out(line)
    })
  }

  const mutation = async (argv: GlobalArgs, op: MutationOp, done: string) => {
    await withSession(argv, async ({ engine }) => {
      await engine.mutate(op)
      io.out(done)
    })
  }

  const parser = withGlobals(yargs(args))
    .scriptName('gitvista')
    .command('status', 'Show the working tree status', (y) => y, (argv) => query(argv, { kind: 'status' }))
    .command(
      'log [range]',
      'Show commit history',
      (y) =>
        y
          .positional('range', { type: 'string', describe: 'Revision range, HEAD by default' })
          .option('limit', { alias: 'n', type: 'number', default: 20 })
          .option('author', { type: 'string' })
          .option('path', { type: 'string', describe: 'Only commits touching this path' }),
      (argv) =>
        query(argv, {
          kind: 'log',
          params: { range: argv.range, author: argv.author, path: argv.path, limit: argv.limit },
        })
    )
    .command('branches', 'List local and remote branches', (y) => y, (argv) => query(argv, { kind: 'branches' }))
    .command('tags', 'List tags', (y) => y, (argv) => query(argv, { kind: 'tags' }))
    .command('remotes', 'List remotes', (y) => y, (argv) => query(argv, { kind: 'remotes' }))
    .command('stashes', 'List stash entries', (y) => y, (argv) => query(argv, { kind: 'stash-list' }))
    .command('submodules', 'List submodules', (y) => y, (argv) => query(argv, { kind: 'submodules' }))
    .command(
      'diff <path>',
      'Show changes of one file',
      (y) =>
        y
          .positional('path', { type: 'string', demandOption: true })
          .option('staged', { type: 'boolean', default: false, describe: 'Compare the index with HEAD' })
          .option('context', { alias: 'U', type: 'number', default: 3 }),
      (argv) =>
        query(argv, {
          kind: 'diff',
          params: { path: argv.path, staged: argv.staged, contextLines: argv.context },
        })
    )
    .command(
      'blame <path>',
      'Show who last changed each line',
      (y) =>
        y
          .positional('path', { type: 'string', demandOption: true })
          .option('rev', { type: 'string', describe: 'Revision to blame' }),
      (argv) => query(argv, { kind: 'blame', params: { path: argv.path, revision: argv.rev } })
    )
    .command(
      'fetch [remote]',
      'Fetch from a remote',
      (y) =>
        y
          .positional('remote', { type: 'string', default: 'origin' })
          .option('prune', { type: 'boolean', default: false }),
      (argv) => query(argv, { kind: 'fetch', params: { remote: argv.remote, prune: argv.prune } })
    )
    .command(
      'push <branch> [remote]',
      'Push a branch',
      (y) =>
        y
          .positional('branch', { type: 'string', demandOption: true })
          .positional('remote', { type: 'string', default: 'origin' })
          .option('force', { type: 'boolean', default: false, describe: 'Force with lease' }),
      (argv) =>
        query(argv, { kind: 'push', params: { remote: argv.remote, branch: argv.branch, force: argv.force } })
    )
    .command(
      'stage <paths..>',
      'Add files to the index',
      (y) => y.positional('paths', { type: 'string', array: true, demandOption: true }),
      (argv) => mutation(argv, { type: 'stage', paths: argv.paths }, `staged ${argv.paths.length} path(s)`)
    )
    .command(
      'unstage <paths..>',
      'Remove files from the index',
      (y) => y.positional('paths', { type: 'string', array: true, demandOption: true }),
      (argv) => mutation(argv, { type: 'unstage', paths: argv.paths }, `unstaged ${argv.paths.length} path(s)`)
    )
    .command(
      'commit',
      'Commit the index',
      (y) =>
        y
          .option('message', { alias: 'm', type: 'string', demandOption: true })
          .option('amend', { type: 'boolean', default: false }),
      (argv) => mutation(argv, { type: 'commit', message: argv.message, amend: argv.amend }, 'committed')
    )
    .command('watch', 'Print status and branches whenever the repository changes', (y) => y, (argv) =>
      withSession(argv, (session) => {
        io.out(`watching ${session.repoDir}`)
        return watchRepository(session, { io, signal: options.signal, subscribe: options.subscribe })
      })
    )
    .demandCommand(1, 'Pass a command, see --help')
    .strict()
    .help()
    .exitProcess(false)
    .fail(false)

  try {
    await parser.parseAsync()
    return 0
  } catch (error) {
    if (error instanceof JobError) {
      io.err(`error (${error.kind}): ${error.message}`)
    } else if (error instanceof Error) {
      io.err(`error: ${error.message}`)
    } else {
      io.err(`error: ${String(error)}`)
    }
    return 1
  }
}
