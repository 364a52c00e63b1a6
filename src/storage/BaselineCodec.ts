import { z } from 'zod'
import {
  BaselineFile,
  BaselineFileSchema,
  BaselineHeaderSchema,
  FingerprintRecordSchema,
} from '../contracts/schemas'
import { FileFingerprint, HashAlgorithm, Snapshot } from '../snapshot/types'
import { compareCodeUnits, createSnapshot } from '../snapshot/snapshot'
import { FormatError } from '../errors'

export const BASELINE_FORMAT_VERSION = 1

/**
 * Serialize a snapshot as a versioned baseline document. Top-level keys are
 * sorted and file records are inserted in code-unit order of their paths, so
 * identical snapshots produce identical files. JSON objects list integer-like
 * names ("2", "10") ahead of the rest, so those records come first.
 */
export function encodeBaseline(snapshot: Snapshot): string {
  // fromEntries defines own properties, so a file named "__proto__" is kept
  const files = Object.fromEntries(
    [...snapshot.files.values()]
      .sort((a, b) => compareCodeUnits(a.path, b.path))
      .map((fingerprint) => [
        fingerprint.path,
        {
          contentHash: fingerprint.contentHash,
          modifiedTime: fingerprint.modifiedTime,
          size: fingerprint.size,
        },
      ])
  )

  const document: BaselineFile = {
    createdAt: snapshot.createdAt,
    files,
    formatVersion: BASELINE_FORMAT_VERSION,
    hashAlgorithm: snapshot.hashAlgorithm,
    id: snapshot.id,
    root: snapshot.root,
  }

  return `${JSON.stringify(document, null, 2)}\n`
}

/**
 * Parse a baseline document. Anything unreadable, from another format
 * version, or hashed with a different algorithm is a FormatError.
 */
export function decodeBaseline(
  text: string,
  options: { location: string; hashAlgorithm: HashAlgorithm }
): Snapshot {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new FormatError(`Baseline at ${options.location} is not valid JSON`, options.location, { cause: error })
  }

  const header = BaselineHeaderSchema.safeParse(raw)
  if (!header.success) {
    throw new FormatError(`Baseline at ${options.location} has no format version`, options.location)
  }
  if (header.data.formatVersion !== BASELINE_FORMAT_VERSION) {
    throw new FormatError(
      `Baseline at ${options.location} uses format version ${header.data.formatVersion}, expected ${BASELINE_FORMAT_VERSION}`,
      options.location
    )
  }

  let document: BaselineFile
  try {
    document = BaselineFileSchema.parse(raw)
  } catch (error) {
    throw malformed(error, [], options.location)
  }

  const files: FileFingerprint[] = []
  for (const [path, value] of Object.entries(document.files)) {
    const record = FingerprintRecordSchema.safeParse(value)
    if (!record.success) {
      throw malformed(record.error, ['files', path], options.location)
    }
    files.push({ path, ...record.data })
  }

  if (document.hashAlgorithm !== options.hashAlgorithm) {
    throw new FormatError(
      `Baseline at ${options.location} was hashed with ${document.hashAlgorithm}, monitor uses ${options.hashAlgorithm}`,
      options.location
    )
  }

  return createSnapshot({
    id: document.id,
    root: document.root,
    createdAt: document.createdAt,
    hashAlgorithm: document.hashAlgorithm,
    files,
  })
}

function malformed(error: unknown, prefix: string[], location: string): FormatError {
  const detail = error instanceof z.ZodError
    ? error.errors.map((issue) => `${[...prefix, ...issue.path].join('.')}: ${issue.message}`).join('; ')
    : String(error)
  return new FormatError(`Baseline at ${location} is malformed: ${detail}`, location, { cause: error })
}
