import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'

/** Name of the optional per-repository configuration file */
export const CONFIG_FILE_NAME = '.gitvista.json'

/**
 * Engine configuration Schema
 *
 * Stored in `<repo>/.gitvista.json`. Every field has a default, so an empty
 * object is a valid configuration.
 */
export const EngineConfigSchema = z.object({
  /** Quiet period before a burst of change signals triggers one refresh (ms) */
  debounceMs: z.number().int().min(0).default(300),
  /** Deadline for fetch and push (ms) */
  networkTimeoutMs: z.number().int().positive().default(30_000),
  /** Minimum interval between progress notifications of one job (ms) */
  progressIntervalMs: z.number().int().min(0).default(200),
  /** Upper bound on backend calls running at the same time */
  maxConcurrentJobs: z.number().int().positive().default(4),
  /** Polling tick feeding the invalidator; 0 disables polling (ms) */
  pollIntervalMs: z.number().int().min(0).default(0),
  /** Extra watcher ignore globs, relative to the repository root */
  watchIgnore: z.array(z.string()).default([]),
  /** git executable */
  gitBinary: z.string().min(1).default('git'),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({})

function parseIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    console.warn(`[ConfigManager] Ignoring ${name}=${value}: expected a non-negative integer`)
    return undefined
  }
  return parsed
}

/**
 * Overrides taken from `GITVISTA_*` environment variables.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {}
  const debounceMs = parseIntegerEnv('GITVISTA_DEBOUNCE_MS', env.GITVISTA_DEBOUNCE_MS)
  if (debounceMs !== undefined) overrides.debounceMs = debounceMs
  const networkTimeoutMs = parseIntegerEnv('GITVISTA_NETWORK_TIMEOUT_MS', env.GITVISTA_NETWORK_TIMEOUT_MS)
  if (networkTimeoutMs !== undefined && networkTimeoutMs > 0) overrides.networkTimeoutMs = networkTimeoutMs
  const gitBinary = env.GITVISTA_GIT_BINARY?.trim()
  if (gitBinary) overrides.gitBinary = gitBinary
  return overrides
}

/**
 * Configuration manager
 *
 * Reads the repository's configuration file and layers environment
 * overrides on top.
 */
export class ConfigManager {
  private configPath: string

  constructor(
    repoDir: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    this.configPath = join(repoDir, CONFIG_FILE_NAME)
  }

  get path(): string {
    return this.configPath
  }

  /**
   * Read the file configuration.
   *
   * A missing file yields the defaults. A malformed file yields the defaults
   * and a warning.
   */
  async readConfig(): Promise<EngineConfig> {
    let content: string
    try {
      content = await readFile(this.configPath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return DEFAULT_CONFIG
      }
      console.warn('[ConfigManager] Failed to read config, using defaults:', err)
      return DEFAULT_CONFIG
    }

    try {
      const parsed: unknown = JSON.parse(content)
      const result = EngineConfigSchema.safeParse(parsed)

      if (result.success) {
        return result.data
      }

      console.warn('[ConfigManager] Invalid config format, using defaults:', result.error.message)
      return DEFAULT_CONFIG
    } catch (err) {
      console.warn('[ConfigManager] Failed to parse config, using defaults:', err)
      return DEFAULT_CONFIG
    }
  }

  /**
   * Effective configuration: file, then environment, then explicit overrides.
   */
  async load(overrides: Partial<EngineConfig> = {}): Promise<EngineConfig> {
    const fileConfig = await this.readConfig()
    return EngineConfigSchema.parse({
      ...fileConfig,
      ...readEnvOverrides(this.env),
      ...overrides,
    })
  }
}
