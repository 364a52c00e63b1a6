import { PermissionError, ReadError } from '../errors'

export type HashAlgorithm = 'sha256' | 'sha512' | 'sha1'

export type SymlinkPolicy = 'skip' | 'follow'

export interface FileFingerprint {
  readonly path: string
  readonly size: number
  readonly modifiedTime: number
  readonly contentHash: string
}

export interface Snapshot {
  readonly id: string
  readonly root: string
  readonly createdAt: string
  readonly hashAlgorithm: HashAlgorithm
  readonly files: ReadonlyMap<string, FileFingerprint>
  /**
   * Paths seen during the walk but not fingerprinted this cycle. Entries
   * ending in `/` cover a whole subtree that could not be listed.
   */
  readonly skipped: ReadonlySet<string>
}

export interface ScanIssue {
  path: string
  error: ReadError | PermissionError
}

export interface ScanReport {
  snapshot: Snapshot
  issues: ScanIssue[]
}
