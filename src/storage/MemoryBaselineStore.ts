import { BaselineStore } from './BaselineStore'
import { decodeBaseline, encodeBaseline } from './BaselineCodec'
import { HashAlgorithm, Snapshot } from '../snapshot/types'
import { PersistError } from '../errors'

/**
 * In-process store. Baselines go through the same encoding as the file store.
 */
export class MemoryBaselineStore implements BaselineStore {
  readonly location = 'memory'
  private document: string | null = null
  private failingSaves = 0
  saveCount = 0

  constructor(private readonly hashAlgorithm: HashAlgorithm = 'sha256') {}

  async load(): Promise<Snapshot | null> {
    if (this.document === null) {
      return null
    }
    return decodeBaseline(this.document, { location: this.location, hashAlgorithm: this.hashAlgorithm })
  }

  async save(snapshot: Snapshot): Promise<void> {
    if (this.failingSaves > 0) {
      this.failingSaves -= 1
      throw new PersistError('Simulated persist failure', this.location)
    }
    this.document = encodeBaseline(snapshot)
    this.saveCount += 1
  }

  async clear(): Promise<void> {
    this.document = null
  }

  /**
   * Make the next `count` saves fail with PersistError
   */
  failNextSaves(count: number): void {
    this.failingSaves = count
  }

  /**
   * Store a raw document, e.g. a corrupt or incompatible baseline
   */
  setRaw(document: string): void {
    this.document = document
  }

  getRaw(): string | null {
    return this.document
  }
}
