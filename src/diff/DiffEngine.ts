import { ChangeEvent } from '../contracts/types'
import { FileFingerprint, Snapshot } from '../snapshot/types'
import { compareCodeUnits, createSnapshot, isSkipped } from '../snapshot/snapshot'
import { createdEvent, deletedEvent, modifiedEvent } from './events'

export interface DiffSummary {
  created: number
  modified: number
  deleted: number
}

/**
 * Compare two snapshots. Events come out in lexical path order across all
 * kinds, so the same pair of snapshots always yields the same sequence.
 * Content hashes decide modification; size and mtime never do.
 */
export function diffSnapshots(
  before: Snapshot,
  after: Snapshot,
  detectedAt: string = after.createdAt
): ChangeEvent[] {
  const events: ChangeEvent[] = []

  for (const [path, afterFile] of after.files) {
    const beforeFile = before.files.get(path)
    if (!beforeFile) {
      events.push(createdEvent(path, afterFile.contentHash, detectedAt))
    } else if (beforeFile.contentHash !== afterFile.contentHash) {
      events.push(modifiedEvent(path, beforeFile.contentHash, afterFile.contentHash, detectedAt))
    }
  }

  for (const [path, beforeFile] of before.files) {
    // Unreadable this cycle is unknown, not gone
    if (!after.files.has(path) && !isSkipped(after, path)) {
      events.push(deletedEvent(path, beforeFile.contentHash, detectedAt))
    }
  }

  return events.sort((a, b) => compareCodeUnits(a.path, b.path))
}

export function summarize(events: readonly ChangeEvent[]): DiffSummary {
  const summary: DiffSummary = { created: 0, modified: 0, deleted: 0 }
  for (const event of events) {
    summary[event.eventType] += 1
  }
  return summary
}

/**
 * The snapshot to keep as the next baseline. Paths that could not be read
 * this cycle keep their previous fingerprint so they stay tracked.
 */
export function acceptSnapshot(baseline: Snapshot, snapshot: Snapshot): Snapshot {
  if (snapshot.skipped.size === 0) {
    return snapshot
  }

  const files: FileFingerprint[] = [...snapshot.files.values()]
  for (const [path, fingerprint] of baseline.files) {
    if (!snapshot.files.has(path) && isSkipped(snapshot, path)) {
      files.push(fingerprint)
    }
  }

  return createSnapshot({
    id: snapshot.id,
    root: snapshot.root,
    createdAt: snapshot.createdAt,
    hashAlgorithm: snapshot.hashAlgorithm,
    files,
  })
}
