import { spawn } from 'node:child_process'
import { GitCommandError } from '../errors.js'

export interface GitCommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface GitRunOptions {
  /** Kills the child process when aborted */
  signal?: AbortSignal
  env?: NodeJS.ProcessEnv
  /** Exit codes accepted besides 0 */
  okExitCodes?: readonly number[]
  onStdout?: (chunk: string) => void
  onStderr?: (chunk: string) => void
}

/**
 * Runs one git command in `cwd`. Resolves on an accepted exit code, rejects
 * with {@link GitCommandError} otherwise and with an AbortError when the
 * signal fires.
 */
export type GitRunner = (cwd: string, args: string[], options?: GitRunOptions) => Promise<GitCommandResult>

/**
 * Default runner: spawns the git executable without a shell, with terminal
 * prompts disabled and a stable locale so output can be parsed.
 */
export function createSpawnRunner(gitBinary = 'git'): GitRunner {
  return (cwd, args, options = {}) =>
    new Promise((resolve, reject) => {
      const child = spawn(gitBinary, args, {
        cwd,
        env: {
          ...process.env,
          GIT_TERMINAL_PROMPT: '0',
          GIT_OPTIONAL_LOCKS: '0',
          LC_ALL: 'C',
          ...options.env,
        },
        signal: options.signal,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      child.stdout.setEncoding('utf8')
      child.stderr.setEncoding('utf8')

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
        options.onStdout?.(chunk)
      })

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
        options.onStderr?.(chunk)
      })

      child.on('error', (err) => {
        reject(err)
      })

      child.on('close', (code) => {
        if (code === 0 || (code !== null && options.okExitCodes?.includes(code))) {
          resolve({ exitCode: code, stdout, stderr })
          return
        }
        reject(new GitCommandError(args, code, stderr))
      })
    })
}
