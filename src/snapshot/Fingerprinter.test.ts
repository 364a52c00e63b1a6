import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import crypto from 'crypto'
import { PassThrough, Readable } from 'stream'
import { Fingerprinter, toFileError } from './Fingerprinter'
import { PermissionError, ReadError } from '../errors'

class StallingFingerprinter extends Fingerprinter {
  protected openStream(): Readable {
    return new PassThrough()
  }
}

const sha = (algorithm: string, content: string | Buffer) =>
  crypto.createHash(algorithm).update(content).digest('hex')

describe('Fingerprinter', () => {
  let testDir: string

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fimon-fingerprint-'))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(testDir, { recursive: true, force: true })
  })

  it('should fingerprint a file with its size, mtime and sha256 digest', async () => {
    const filePath = path.join(testDir, 'notes.txt')
    fs.writeFileSync(filePath, 'hello world')
    const stats = fs.statSync(filePath)

    const fingerprint = await new Fingerprinter().fingerprint(filePath, 'notes.txt')

    expect(fingerprint).toEqual({
      path: 'notes.txt',
      size: 11,
      modifiedTime: stats.mtimeMs,
      contentHash: sha('sha256', 'hello world'),
    })
  })

  it('should hash the whole file when it spans many chunks', async () => {
    const content = Buffer.alloc(10_000, 'abcdefghij')
    const filePath = path.join(testDir, 'large.bin')
    fs.writeFileSync(filePath, content)

    const fingerprint = await new Fingerprinter({ chunkSize: 1024 }).fingerprint(filePath, 'large.bin')

    expect(fingerprint.size).toBe(10_000)
    expect(fingerprint.contentHash).toBe(sha('sha256', content))
  })

  it('should hash an empty file', async () => {
    const filePath = path.join(testDir, 'empty')
    fs.writeFileSync(filePath, '')

    const fingerprint = await new Fingerprinter().fingerprint(filePath, 'empty')

    expect(fingerprint.size).toBe(0)
    expect(fingerprint.contentHash).toBe(sha('sha256', ''))
  })

  it('should use the configured hash algorithm', async () => {
    const filePath = path.join(testDir, 'data.txt')
    fs.writeFileSync(filePath, 'payload')

    const fingerprinter = new Fingerprinter({ hashAlgorithm: 'sha512' })
    const fingerprint = await fingerprinter.fingerprint(filePath, 'data.txt')

    expect(fingerprinter.hashAlgorithm).toBe('sha512')
    expect(fingerprint.contentHash).toHaveLength(128)
    expect(fingerprint.contentHash).toBe(sha('sha512', 'payload'))
  })

  it('should report a missing file as vanished', async () => {
    const attempt = new Fingerprinter().fingerprint(path.join(testDir, 'gone.txt'), 'gone.txt')

    await expect(attempt).rejects.toBeInstanceOf(ReadError)
    await expect(attempt).rejects.toMatchObject({ path: 'gone.txt', reason: 'vanished' })
  })

  it('should refuse to fingerprint a directory', async () => {
    fs.mkdirSync(path.join(testDir, 'sub'))

    await expect(
      new Fingerprinter().fingerprint(path.join(testDir, 'sub'), 'sub')
    ).rejects.toMatchObject({ reason: 'unreadable', message: 'Not a regular file: sub' })
  })

  it('should report a file that grows while it is read as a race', async () => {
    const filePath = path.join(testDir, 'grow.txt')
    fs.writeFileSync(filePath, 'hello')
    const realStat = fs.promises.stat.bind(fs.promises)
    vi.spyOn(fs.promises, 'stat').mockImplementationOnce(async (target) => {
      const stats = await realStat(target)
      fs.appendFileSync(filePath, ' world')
      return stats
    })

    const attempt = new Fingerprinter().fingerprint(filePath, 'grow.txt')

    await expect(attempt).rejects.toBeInstanceOf(ReadError)
    await expect(attempt).rejects.toMatchObject({
      reason: 'race',
      message: 'File changed while it was being read: grow.txt',
    })
  })

  it('should give up on a read that stalls past the timeout', async () => {
    const filePath = path.join(testDir, 'slow.txt')
    fs.writeFileSync(filePath, 'slow')

    const attempt = new StallingFingerprinter({ readTimeoutMs: 1 }).fingerprint(filePath, 'slow.txt')

    await expect(attempt).rejects.toBeInstanceOf(ReadError)
    await expect(attempt).rejects.toMatchObject({
      path: 'slow.txt',
      reason: 'timeout',
      message: 'Timed out after 1ms reading slow.txt',
    })
  })

  it('should give identical digests for identical content', async () => {
    fs.writeFileSync(path.join(testDir, 'a.txt'), 'same bytes')
    fs.writeFileSync(path.join(testDir, 'b.txt'), 'same bytes')
    const fingerprinter = new Fingerprinter()

    const a = await fingerprinter.fingerprint(path.join(testDir, 'a.txt'), 'a.txt')
    const b = await fingerprinter.fingerprint(path.join(testDir, 'b.txt'), 'b.txt')

    expect(a.contentHash).toBe(b.contentHash)
  })
})

describe('toFileError', () => {
  const fsError = (code: string) => Object.assign(new Error(`${code}: failure`), { code })

  it('should map missing entries to vanished', () => {
    const error = toFileError(fsError('ENOENT'), 'a.txt')

    expect(error).toBeInstanceOf(ReadError)
    expect(error).toMatchObject({ reason: 'vanished', message: 'File vanished: a.txt' })
  })

  it('should map access failures to PermissionError', () => {
    for (const code of ['EACCES', 'EPERM']) {
      const error = toFileError(fsError(code), 'secret.txt')

      expect(error).toBeInstanceOf(PermissionError)
      expect(error.message).toBe('Permission denied: secret.txt')
    }
  })

  it('should map other failures to unreadable with the code', () => {
    const error = toFileError(fsError('EIO'), 'disk.img')

    expect(error).toMatchObject({ reason: 'unreadable', message: 'Unable to read disk.img (EIO)' })
  })

  it('should pass through errors that are already classified', () => {
    const original = new ReadError('Timed out', 'slow.txt', 'timeout')

    expect(toFileError(original, 'slow.txt')).toBe(original)
  })
})
