import { z } from 'zod'
import type {
  BlameLine,
  BranchInfo,
  CommitInfo,
  FetchSummary,
  FileDiff,
  PushSummary,
  RemoteInfo,
  StashEntry,
  StatusEntry,
  SubmoduleInfo,
  TagInfo,
} from './backend/types.js'

export const JobKindSchema = z.enum([
  'status',
  'diff',
  'blame',
  'log',
  'tags',
  'branches',
  'remotes',
  'fetch',
  'push',
  'stash-list',
  'submodules',
])

export type JobKind = z.infer<typeof JobKindSchema>

export const JOB_KINDS: readonly JobKind[] = JobKindSchema.options

/** Kinds that report progress while they run */
export const PROGRESS_KINDS: ReadonlySet<JobKind> = new Set<JobKind>(['blame', 'log', 'fetch', 'push'])

/** Kinds that talk to a remote: they carry a timeout and need the exclusive scope */
export const NETWORK_KINDS: ReadonlySet<JobKind> = new Set<JobKind>(['fetch', 'push'])

/** Query kinds re-issued when the repository changes; network kinds are user actions */
export const REFRESHABLE_KINDS: ReadonlySet<JobKind> = new Set(
  JOB_KINDS.filter((kind) => !NETWORK_KINDS.has(kind))
)

const EmptyParamsSchema = z.object({}).default({})

/** Revision, remote or branch name passed to git as a positional argument */
const RefSchema = z
  .string()
  .min(1)
  .refine((value) => !value.startsWith('-'), { message: 'Must not start with "-"' })

export const DiffParamsSchema = z.object({
  path: z.string().min(1),
  staged: z.boolean().default(false),
  contextLines: z.number().int().min(0).default(3),
})

export const BlameParamsSchema = z.object({
  path: z.string().min(1),
  revision: RefSchema.optional(),
})

export const LogParamsSchema = z
  .object({
    range: RefSchema.optional(),
    author: z.string().min(1).optional(),
    path: z.string().min(1).optional(),
    limit: z.number().int().positive().default(200),
    skip: z.number().int().min(0).default(0),
  })
  .default({})

export const FetchParamsSchema = z
  .object({
    remote: RefSchema.default('origin'),
    prune: z.boolean().default(false),
  })
  .default({})

export const PushParamsSchema = z.object({
  remote: RefSchema.default('origin'),
  branch: RefSchema,
  force: z.boolean().default(false),
})

/**
 * Every submittable job, keyed by kind. Parsing a submission through this
 * schema applies parameter defaults, so equal views produce equal
 * fingerprints.
 */
export const JobSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('status'), params: EmptyParamsSchema }),
  z.object({ kind: z.literal('diff'), params: DiffParamsSchema }),
  z.object({ kind: z.literal('blame'), params: BlameParamsSchema }),
  z.object({ kind: z.literal('log'), params: LogParamsSchema }),
  z.object({ kind: z.literal('tags'), params: EmptyParamsSchema }),
  z.object({ kind: z.literal('branches'), params: EmptyParamsSchema }),
  z.object({ kind: z.literal('remotes'), params: EmptyParamsSchema }),
  z.object({ kind: z.literal('fetch'), params: FetchParamsSchema }),
  z.object({ kind: z.literal('push'), params: PushParamsSchema }),
  z.object({ kind: z.literal('stash-list'), params: EmptyParamsSchema }),
  z.object({ kind: z.literal('submodules'), params: EmptyParamsSchema }),
])

export type JobSpec = z.infer<typeof JobSpecSchema>
export type JobSpecInput = z.input<typeof JobSpecSchema>
export type JobParams<K extends JobKind> = Extract<JobSpec, { kind: K }>['params']

/** A parsed submission, stamped with the generation it was created at */
export type JobRequest = JobSpec & {
  readonly fingerprint: string
  readonly requestedAt: number
}

export interface JobPayloadMap {
  status: StatusEntry[]
  diff: FileDiff
  blame: BlameLine[]
  log: CommitInfo[]
  tags: TagInfo[]
  branches: BranchInfo[]
  remotes: RemoteInfo[]
  fetch: FetchSummary
  push: PushSummary
  'stash-list': StashEntry[]
  submodules: SubmoduleInfo[]
}

export type JobPayload<K extends JobKind> = JobPayloadMap[K]

export type JobResult = { [K in JobKind]: { kind: K; payload: JobPayloadMap[K] } }[JobKind]

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value)
}

function fingerprintParsed(spec: JobSpec): string {
  return `${spec.kind}:${stableStringify(spec.params)}`
}

/**
 * Cache key of a submission. Parameter order and omitted defaults do not
 * change it.
 */
export function fingerprintOf(input: JobSpecInput): string {
  return fingerprintParsed(JobSpecSchema.parse(input))
}

/**
 * Validate a submission and freeze it into a request.
 * Throws a ZodError when the parameters do not fit the kind.
 */
export function createJobRequest(input: JobSpecInput, generation: number): JobRequest {
  const spec = JobSpecSchema.parse(input)
  Object.freeze(spec.params)
  return Object.freeze({
    ...spec,
    fingerprint: fingerprintParsed(spec),
    requestedAt: generation,
  })
}
