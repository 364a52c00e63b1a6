import { EventBatch } from '../contracts/types'

/**
 * Consumer of change events for one monitored root. Rejects with SinkError
 * when a batch could not be delivered.
 */
export interface EventSink {
  readonly name: string
  deliver(batch: EventBatch): Promise<void>
}
