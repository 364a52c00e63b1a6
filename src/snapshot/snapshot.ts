import { v4 as uuidv4 } from 'uuid'
import { FileFingerprint, HashAlgorithm, Snapshot } from './types'

export function createSnapshot(init: {
  root: string
  hashAlgorithm: HashAlgorithm
  files: Iterable<FileFingerprint>
  skipped?: Iterable<string>
  id?: string
  createdAt?: string
}): Snapshot {
  const files = new Map<string, FileFingerprint>()
  for (const fingerprint of init.files) {
    files.set(fingerprint.path, Object.freeze({ ...fingerprint }))
  }

  return Object.freeze({
    id: init.id ?? uuidv4(),
    root: init.root,
    createdAt: init.createdAt ?? new Date().toISOString(),
    hashAlgorithm: init.hashAlgorithm,
    files,
    skipped: new Set(init.skipped ?? []),
  })
}

export function emptySnapshot(root: string, hashAlgorithm: HashAlgorithm): Snapshot {
  return createSnapshot({ root, hashAlgorithm, files: [] })
}

/**
 * Whether a path is covered by the snapshot's skipped set, either directly or
 * through a skipped subtree prefix.
 */
export function isSkipped(snapshot: Snapshot, path: string): boolean {
  if (snapshot.skipped.has(path)) {
    return true
  }
  for (const entry of snapshot.skipped) {
    if (entry.endsWith('/') && path.startsWith(entry)) {
      return true
    }
  }
  return false
}

/**
 * Locale-independent string ordering
 */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
