import fs, { Stats } from 'fs'
import crypto from 'crypto'
import { Readable } from 'stream'
import { FileFingerprint, HashAlgorithm } from './types'
import { PermissionError, ReadError, isSoftFileError } from '../errors'

export interface FingerprinterOptions {
  hashAlgorithm?: HashAlgorithm
  chunkSize?: number
  readTimeoutMs?: number
}

export class Fingerprinter {
  static readonly DEFAULT_CHUNK_SIZE = 64 * 1024
  static readonly DEFAULT_READ_TIMEOUT_MS = 30_000

  readonly hashAlgorithm: HashAlgorithm
  private readonly chunkSize: number
  private readonly readTimeoutMs: number

  constructor(options: FingerprinterOptions = {}) {
    this.hashAlgorithm = options.hashAlgorithm ?? 'sha256'
    this.chunkSize = options.chunkSize ?? Fingerprinter.DEFAULT_CHUNK_SIZE
    this.readTimeoutMs = options.readTimeoutMs ?? Fingerprinter.DEFAULT_READ_TIMEOUT_MS
  }

  /**
   * Fingerprint a single file. The file is stat'ed before and after hashing;
   * any change in between is reported as a read race.
   */
  async fingerprint(absolutePath: string, relativePath: string): Promise<FileFingerprint> {
    const before = await this.stat(absolutePath, relativePath)
    if (!before.isFile()) {
      throw new ReadError(`Not a regular file: ${relativePath}`, relativePath, 'unreadable')
    }

    const { contentHash, bytesRead } = await this.hashContent(absolutePath, relativePath)
    const after = await this.stat(absolutePath, relativePath)

    if (
      bytesRead !== before.size ||
      after.size !== before.size ||
      after.mtimeMs !== before.mtimeMs
    ) {
      throw new ReadError(
        `File changed while it was being read: ${relativePath}`,
        relativePath,
        'race'
      )
    }

    return {
      path: relativePath,
      size: before.size,
      modifiedTime: before.mtimeMs,
      contentHash,
    }
  }

  /**
   * Hash a file by streaming it in chunks, bounded by the read timeout
   */
  private hashContent(
    absolutePath: string,
    relativePath: string
  ): Promise<{ contentHash: string; bytesRead: number }> {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash(this.hashAlgorithm)
      const stream = this.openStream(absolutePath)
      let bytesRead = 0

      const timer = setTimeout(() => {
        stream.destroy(
          new ReadError(
            `Timed out after ${this.readTimeoutMs}ms reading ${relativePath}`,
            relativePath,
            'timeout'
          )
        )
      }, this.readTimeoutMs)

      stream.on('data', (chunk: Buffer | string) => {
        hash.update(chunk)
        bytesRead += Buffer.byteLength(chunk)
      })
      stream.on('error', (error) => {
        clearTimeout(timer)
        reject(toFileError(error, relativePath))
      })
      stream.on('end', () => {
        clearTimeout(timer)
        resolve({ contentHash: hash.digest('hex'), bytesRead })
      })
    })
  }

  protected openStream(absolutePath: string): Readable {
    return fs.createReadStream(absolutePath, { highWaterMark: this.chunkSize })
  }

  private async stat(absolutePath: string, relativePath: string): Promise<Stats> {
    try {
      return await fs.promises.stat(absolutePath)
    } catch (error) {
      throw toFileError(error, relativePath)
    }
  }
}

/**
 * Map a filesystem error onto the per-file error taxonomy
 */
export function toFileError(error: unknown, relativePath: string): ReadError | PermissionError {
  if (isSoftFileError(error)) {
    return error
  }

  const code = errorCode(error)
  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new ReadError(`File vanished: ${relativePath}`, relativePath, 'vanished', { cause: error })
    case 'EACCES':
    case 'EPERM':
      return new PermissionError(`Permission denied: ${relativePath}`, relativePath, { cause: error })
    default:
      return new ReadError(
        `Unable to read ${relativePath}${code ? ` (${code})` : ''}`,
        relativePath,
        'unreadable',
        { cause: error }
      )
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
