/**
 * Failure categories the engine distinguishes.
 *
 * `cancelled` and `busy` stay inside the engine; the others reach the
 * consumer as `failed` notifications.
 */
export type ErrorKind =
  | 'backend-failure'
  | 'cancelled'
  | 'timeout'
  | 'credentials-required'
  | 'credentials-rejected'
  | 'busy'

const INTERNAL_ERROR_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['cancelled', 'busy'])

export function isSurfacedError(kind: ErrorKind): boolean {
  return !INTERNAL_ERROR_KINDS.has(kind)
}

export class JobError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'JobError'
    this.kind = kind
  }
}

/**
 * Non-zero exit of a git command.
 */
export class GitCommandError extends Error {
  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    const detail = stderr.trim().split('\n').filter(Boolean).pop() ?? 'no output'
    super(`git ${args[0] ?? ''} exited with code ${exitCode ?? 'null'}: ${detail}`)
    this.name = 'GitCommandError'
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * Normalize anything a backend call may throw into a {@link JobError}.
 */
export function toJobError(error: unknown): JobError {
  if (error instanceof JobError) return error
  if (isAbortError(error)) {
    return new JobError('cancelled', 'Operation was cancelled', { cause: error })
  }
  if (error instanceof Error) {
    return new JobError('backend-failure', error.message, { cause: error })
  }
  return new JobError('backend-failure', String(error))
}
