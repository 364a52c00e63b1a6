import { describe, it, expect } from 'vitest'
import { acceptSnapshot, diffSnapshots, summarize } from './DiffEngine'
import { modifiedEvent } from './events'
import { createSnapshot } from '../snapshot/snapshot'
import { FileFingerprint, Snapshot } from '../snapshot/types'

const CREATED_AT = '2024-03-01T12:00:00.000Z'

const fingerprint = (
  path: string,
  contentHash: string,
  size: number = 10,
  modifiedTime: number = 1_700_000_000_000
): FileFingerprint => ({ path, size, modifiedTime, contentHash })

const snapshot = (files: FileFingerprint[], skipped: string[] = [], createdAt = CREATED_AT): Snapshot =>
  createSnapshot({ root: '/watched', hashAlgorithm: 'sha256', createdAt, files, skipped })

// Deterministic pseudo-random generator so property checks are repeatable
function lcg(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648
    return state / 2147483648
  }
}

function randomSnapshot(random: () => number, universe: string[]): Snapshot {
  const files: FileFingerprint[] = []
  for (const path of universe) {
    if (random() < 0.6) {
      files.push(fingerprint(path, `hash-${Math.floor(random() * 3)}`))
    }
  }
  return snapshot(files)
}

describe('diffSnapshots', () => {
  it('should yield no events when a snapshot is diffed against itself', () => {
    const snap = snapshot([fingerprint('a.txt', 'hashA'), fingerprint('dir/b.txt', 'hashB')])

    expect(diffSnapshots(snap, snap)).toEqual([])
  })

  it('should report a created file', () => {
    const baseline = snapshot([fingerprint('a.txt', 'hashA')])
    const scan = snapshot([fingerprint('a.txt', 'hashA'), fingerprint('b.txt', 'hashB')])

    expect(diffSnapshots(baseline, scan)).toEqual([
      { eventType: 'created', path: 'b.txt', newHash: 'hashB', timestamp: CREATED_AT },
    ])
  })

  it('should report a modified file', () => {
    const baseline = snapshot([fingerprint('a.txt', 'hashA')])
    const scan = snapshot([fingerprint('a.txt', 'hashA2')])

    expect(diffSnapshots(baseline, scan)).toEqual([
      { eventType: 'modified', path: 'a.txt', oldHash: 'hashA', newHash: 'hashA2', timestamp: CREATED_AT },
    ])
  })

  it('should report a deleted file', () => {
    const baseline = snapshot([fingerprint('a.txt', 'hashA'), fingerprint('b.txt', 'hashB')])
    const scan = snapshot([fingerprint('a.txt', 'hashA')])

    expect(diffSnapshots(baseline, scan)).toEqual([
      { eventType: 'deleted', path: 'b.txt', oldHash: 'hashB', timestamp: CREATED_AT },
    ])
  })

  it('should ignore mtime and size changes when content is identical', () => {
    const baseline = snapshot([fingerprint('a.txt', 'hashA', 10, 1000)])
    const scan = snapshot([fingerprint('a.txt', 'hashA', 12, 999_999)])

    expect(diffSnapshots(baseline, scan)).toEqual([])
  })

  it('should order events by path across event kinds', () => {
    const baseline = snapshot([fingerprint('B.txt', 'old-b'), fingerprint('c.txt', 'old-c')])
    const scan = snapshot([fingerprint('c.txt', 'new-c'), fingerprint('a.txt', 'new-a')])

    const events = diffSnapshots(baseline, scan)

    // Code unit order: uppercase sorts before lowercase
    expect(events.map((event) => `${event.eventType}:${event.path}`)).toEqual([
      'deleted:B.txt',
      'created:a.txt',
      'modified:c.txt',
    ])
  })

  it('should produce identical output regardless of map insertion order', () => {
    const files = [
      fingerprint('z.txt', 'h1'),
      fingerprint('m/n.txt', 'h2'),
      fingerprint('a.txt', 'h3'),
    ]
    const baseline = snapshot([fingerprint('a.txt', 'h0'), fingerprint('q.txt', 'h9')])

    const forward = diffSnapshots(baseline, snapshot(files))
    const reversed = diffSnapshots(baseline, snapshot([...files].reverse()))

    expect(JSON.stringify(reversed)).toBe(JSON.stringify(forward))
    expect(JSON.stringify(diffSnapshots(baseline, snapshot(files)))).toBe(JSON.stringify(forward))
  })

  it('should use an explicit detection time when given', () => {
    const baseline = snapshot([])
    const scan = snapshot([fingerprint('a.txt', 'hashA')])

    const [event] = diffSnapshots(baseline, scan, '2024-03-02T00:00:00.000Z')

    expect(event.timestamp).toBe('2024-03-02T00:00:00.000Z')
  })

  it('should not report skipped paths as deleted', () => {
    const baseline = snapshot([
      fingerprint('locked.txt', 'h1'),
      fingerprint('private/key.txt', 'h2'),
      fingerprint('gone.txt', 'h3'),
    ])
    const scan = snapshot([], ['locked.txt', 'private/'])

    expect(diffSnapshots(baseline, scan)).toEqual([
      { eventType: 'deleted', path: 'gone.txt', oldHash: 'h3', timestamp: CREATED_AT },
    ])
  })

  it('should partition the symmetric difference and changed hashes exactly', () => {
    const universe = Array.from({ length: 20 }, (_, index) => `dir${index % 3}/file-${index}.txt`)

    for (let seed = 1; seed <= 25; seed++) {
      const random = lcg(seed)
      const before = randomSnapshot(random, universe)
      const after = randomSnapshot(random, universe)

      const events = diffSnapshots(before, after)
      const paths = events.map((event) => event.path)

      expect(new Set(paths).size).toBe(paths.length)

      const expected = new Map<string, string>()
      for (const path of universe) {
        const oldFile = before.files.get(path)
        const newFile = after.files.get(path)
        if (!oldFile && newFile) expected.set(path, 'created')
        if (oldFile && !newFile) expected.set(path, 'deleted')
        if (oldFile && newFile && oldFile.contentHash !== newFile.contentHash) expected.set(path, 'modified')
      }

      expect(new Map(events.map((event) => [event.path, event.eventType]))).toEqual(expected)
    }
  })
})

describe('summarize', () => {
  it('should count events per kind', () => {
    const baseline = snapshot([fingerprint('a', 'h1'), fingerprint('b', 'h2')])
    const scan = snapshot([fingerprint('a', 'h1x'), fingerprint('c', 'h3'), fingerprint('d', 'h4')])

    expect(summarize(diffSnapshots(baseline, scan))).toEqual({ created: 2, modified: 1, deleted: 1 })
  })
})

describe('acceptSnapshot', () => {
  it('should return the scan unchanged when nothing was skipped', () => {
    const baseline = snapshot([fingerprint('a.txt', 'h1')])
    const scan = snapshot([fingerprint('b.txt', 'h2')])

    expect(acceptSnapshot(baseline, scan)).toBe(scan)
  })

  it('should carry forward fingerprints of skipped paths', () => {
    const baseline = snapshot([
      fingerprint('a.txt', 'h1'),
      fingerprint('b.txt', 'h2'),
      fingerprint('dir/x.txt', 'h3'),
    ])
    const scan = snapshot([fingerprint('b.txt', 'h2-new')], ['a.txt', 'dir/'])

    const accepted = acceptSnapshot(baseline, scan)

    expect(accepted.id).toBe(scan.id)
    expect(accepted.skipped.size).toBe(0)
    expect([...accepted.files.keys()].sort()).toEqual(['a.txt', 'b.txt', 'dir/x.txt'])
    expect(accepted.files.get('a.txt')?.contentHash).toBe('h1')
    expect(accepted.files.get('b.txt')?.contentHash).toBe('h2-new')
    expect(accepted.files.get('dir/x.txt')?.contentHash).toBe('h3')
  })
})

describe('event constructors', () => {
  it('should refuse a modified event without a hash change', () => {
    expect(() => modifiedEvent('a.txt', 'same', 'same', CREATED_AT)).toThrow(
      'Modified event for a.txt requires differing hashes'
    )
  })

  it('should produce frozen events', () => {
    const [event] = diffSnapshots(snapshot([]), snapshot([fingerprint('a.txt', 'h1')]))

    expect(Object.isFrozen(event)).toBe(true)
  })
})
