import { promises as fs } from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { BaselineStore } from './BaselineStore'
import { decodeBaseline, encodeBaseline } from './BaselineCodec'
import { HashAlgorithm, Snapshot } from '../snapshot/types'
import { FormatError, PersistError, errorMessage } from '../errors'
import { logger as defaultLogger, Logger } from '../logging/logger'

export interface FileBaselineStoreOptions {
  filePath: string
  hashAlgorithm: HashAlgorithm
  logger?: Logger
}

export class FileBaselineStore implements BaselineStore {
  readonly location: string
  private readonly hashAlgorithm: HashAlgorithm
  private readonly logger: Logger

  constructor(options: FileBaselineStoreOptions) {
    this.location = path.resolve(options.filePath)
    this.hashAlgorithm = options.hashAlgorithm
    this.logger = options.logger ?? defaultLogger
  }

  async load(): Promise<Snapshot | null> {
    let text: string
    try {
      text = await fs.readFile(this.location, 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug('No baseline found', { location: this.location })
        return null
      }
      throw new FormatError(
        `Baseline at ${this.location} is unreadable: ${errorMessage(error)}`,
        this.location,
        { cause: error }
      )
    }

    return decodeBaseline(text, { location: this.location, hashAlgorithm: this.hashAlgorithm })
  }

  /**
   * Write to a unique temporary file beside the baseline, flush it, then
   * rename it over the baseline. Readers see the old or the new file, never a
   * partial one.
   */
  async save(snapshot: Snapshot): Promise<void> {
    const tempPath = `${this.location}.${uuidv4()}.tmp`
    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true })
      const handle = await fs.open(tempPath, 'w')
      try {
        await handle.writeFile(encodeBaseline(snapshot), 'utf8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await fs.rename(tempPath, this.location)
    } catch (error) {
      await this.removeTemp(tempPath)
      throw new PersistError(
        `Failed to persist baseline to ${this.location}: ${errorMessage(error)}`,
        this.location,
        { cause: error }
      )
    }

    this.logger.debug('Baseline persisted', {
      location: this.location,
      snapshotId: snapshot.id,
      fileCount: snapshot.files.size,
    })
  }

  async clear(): Promise<void> {
    await fs.rm(this.location, { force: true })
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true })
    } catch (error) {
      this.logger.debug('Could not remove temporary baseline file', {
        tempPath,
        error: errorMessage(error),
      })
    }
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}
