import { Snapshot } from '../snapshot/types'

/**
 * Durable home of one monitored root's baseline. Exactly one monitor loop
 * reads and writes a given store.
 */
export interface BaselineStore {
  /** Human readable location, used in logs and status output */
  readonly location: string

  /**
   * Load the persisted baseline, or null when none exists yet.
   * Throws FormatError when the stored baseline cannot be used.
   */
  load(): Promise<Snapshot | null>

  /**
   * Replace the persisted baseline atomically. Throws PersistError.
   */
  save(snapshot: Snapshot): Promise<void>

  clear(): Promise<void>
}
