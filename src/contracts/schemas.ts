import { z } from 'zod'

export const HashAlgorithmSchema = z.enum(['sha256', 'sha512', 'sha1'])

export const SinkConfigSchema = z.object({
  endpoint: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(5000),
})

// Config schema
export const MonitorConfigSchema = z.object({
  root: z.string().min(1).default('.'),
  baselinePath: z.string().min(1).optional(),
  intervalMs: z.number().int().min(500).default(5000),
  workers: z.number().int().min(1).max(64).default(4),
  symlinks: z.enum(['skip', 'follow']).default('skip'),
  readTimeoutMs: z.number().int().positive().default(30000),
  chunkSize: z.number().int().min(1024).default(64 * 1024),
  hashAlgorithm: HashAlgorithmSchema.default('sha256'),
  ignore: z.array(z.string()).default(['.git', '__pycache__']),
  useGitignore: z.boolean().default(false),
  delivery: z.enum(['at-least-once', 'best-effort']).default('at-least-once'),
  initialBaseline: z.enum(['silent', 'report']).default('silent'),
  sink: SinkConfigSchema.default({ timeoutMs: 5000 }),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
})

export const FingerprintRecordSchema = z.object({
  size: z.number().int().nonnegative(),
  // Negative for files last modified before 1970
  modifiedTime: z.number(),
  contentHash: z.string().regex(/^[0-9a-f]+$/),
})

// Only the version field is checked first so newer formats get a clear message
export const BaselineHeaderSchema = z.object({
  formatVersion: z.number().int(),
})

export const BaselineFileSchema = z.object({
  formatVersion: z.literal(1),
  hashAlgorithm: HashAlgorithmSchema,
  root: z.string(),
  id: z.string(),
  createdAt: z.string(),
  // Records are checked one by one in the codec; z.record drops a "__proto__" key
  files: z.custom<Record<string, unknown>>(
    (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
    { message: 'Expected an object of file records' }
  ),
})

export type FingerprintRecord = z.infer<typeof FingerprintRecordSchema>
export type BaselineFile = z.infer<typeof BaselineFileSchema>
