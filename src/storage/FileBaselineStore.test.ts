import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { FileBaselineStore } from './FileBaselineStore'
import { MemoryBaselineStore } from './MemoryBaselineStore'
import { createSnapshot } from '../snapshot/snapshot'
import { SnapshotBuilder } from '../snapshot/SnapshotBuilder'
import { diffSnapshots } from '../diff/DiffEngine'
import { FormatError, PersistError } from '../errors'
import { createLogger } from '../logging/logger'

const logger = createLogger({ silent: true })

const snapshotWith = (contentHash: string) =>
  createSnapshot({
    root: '/watched',
    hashAlgorithm: 'sha256',
    files: [{ path: 'a.txt', size: 1, modifiedTime: 1000, contentHash }],
  })

describe('FileBaselineStore', () => {
  let tempDir: string
  let baselinePath: string
  let store: FileBaselineStore

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fimon-store-'))
    baselinePath = path.join(tempDir, 'baselines', 'root.json')
    store = new FileBaselineStore({ filePath: baselinePath, hashAlgorithm: 'sha256', logger })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should return null when no baseline exists', async () => {
    expect(await store.load()).toBeNull()
  })

  it('should save and load a baseline', async () => {
    const snapshot = snapshotWith('aa11')

    await store.save(snapshot)
    const loaded = await store.load()

    expect(loaded?.id).toBe(snapshot.id)
    expect(loaded?.files.get('a.txt')?.contentHash).toBe('aa11')
    expect(store.location).toBe(baselinePath)
  })

  it('should round-trip files modified before 1970', async () => {
    const root = path.join(tempDir, 'watched')
    fs.mkdirSync(root)
    const filePath = path.join(root, 'old.txt')
    fs.writeFileSync(filePath, 'from the sixties')
    const sixties = new Date('1965-06-01T00:00:00Z')
    fs.utimesSync(filePath, sixties, sixties)
    const builder = new SnapshotBuilder({ root, excludePaths: [baselinePath], logger })
    const { snapshot } = await builder.build()

    await store.save(snapshot)
    const loaded = await store.load()

    expect(snapshot.files.get('old.txt')?.modifiedTime).toBe(sixties.getTime())
    expect(loaded?.files.get('old.txt')).toEqual(snapshot.files.get('old.txt'))
  })

  it('should not report a file named __proto__ as created after a restart', async () => {
    const root = path.join(tempDir, 'watched')
    fs.mkdirSync(root)
    fs.writeFileSync(path.join(root, '__proto__'), 'odd name')
    fs.writeFileSync(path.join(root, 'a.txt'), 'alpha')
    const builder = new SnapshotBuilder({ root, excludePaths: [baselinePath], logger })

    await store.save((await builder.build()).snapshot)
    const loaded = await store.load()
    const rescan = await builder.build()

    expect([...(loaded?.files.keys() ?? [])]).toEqual(['__proto__', 'a.txt'])
    expect(loaded ? diffSnapshots(loaded, rescan.snapshot) : null).toEqual([])
  })

  it('should leave no temporary files behind after saving', async () => {
    await store.save(snapshotWith('aa11'))
    await store.save(snapshotWith('bb22'))

    expect(fs.readdirSync(path.dirname(baselinePath))).toEqual(['root.json'])
  })

  it('should keep the previous baseline when the final rename fails', async () => {
    await store.save(snapshotWith('aa11'))
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(new Error('disk full'))

    await expect(store.save(snapshotWith('bb22'))).rejects.toThrow(
      new PersistError(`Failed to persist baseline to ${baselinePath}: disk full`, baselinePath)
    )

    const loaded = await store.load()
    expect(loaded?.files.get('a.txt')?.contentHash).toBe('aa11')
    expect(fs.readdirSync(path.dirname(baselinePath))).toEqual(['root.json'])
  })

  it('should fail with PersistError when the directory cannot be created', async () => {
    const blocker = path.join(tempDir, 'blocker')
    fs.writeFileSync(blocker, 'not a directory')
    const blocked = new FileBaselineStore({
      filePath: path.join(blocker, 'root.json'),
      hashAlgorithm: 'sha256',
      logger,
    })

    await expect(blocked.save(snapshotWith('aa11'))).rejects.toBeInstanceOf(PersistError)
  })

  it('should report a corrupt baseline as a FormatError', async () => {
    fs.mkdirSync(path.dirname(baselinePath), { recursive: true })
    fs.writeFileSync(baselinePath, 'garbage')

    await expect(store.load()).rejects.toBeInstanceOf(FormatError)
  })

  it('should report a baseline from another hash algorithm as a FormatError', async () => {
    await store.save(snapshotWith('aa11'))
    const sha512Store = new FileBaselineStore({ filePath: baselinePath, hashAlgorithm: 'sha512', logger })

    await expect(sha512Store.load()).rejects.toThrow(
      `Baseline at ${baselinePath} was hashed with sha256, monitor uses sha512`
    )
  })

  it('should remove the baseline on clear', async () => {
    await store.save(snapshotWith('aa11'))
    await store.clear()

    expect(await store.load()).toBeNull()
    await expect(store.clear()).resolves.toBeUndefined()
  })
})

describe('MemoryBaselineStore', () => {
  it('should round-trip through the baseline encoding', async () => {
    const store = new MemoryBaselineStore()
    const snapshot = snapshotWith('aa11')

    await store.save(snapshot)

    expect(store.saveCount).toBe(1)
    expect((await store.load())?.files.get('a.txt')?.contentHash).toBe('aa11')
    expect(store.getRaw()).toContain('"formatVersion": 1')
  })

  it('should fail the requested number of saves', async () => {
    const store = new MemoryBaselineStore()
    store.failNextSaves(1)

    await expect(store.save(snapshotWith('aa11'))).rejects.toBeInstanceOf(PersistError)
    await expect(store.save(snapshotWith('aa11'))).resolves.toBeUndefined()
    expect(store.saveCount).toBe(1)
  })
})
