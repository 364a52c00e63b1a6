import { EventSink } from './EventSink'
import { ChangeEvent, EventBatch } from '../contracts/types'
import { SinkError } from '../errors'

export class MemoryEventSink implements EventSink {
  readonly name = 'memory'
  readonly batches: EventBatch[] = []
  attempts = 0
  private failingDeliveries = 0

  async deliver(batch: EventBatch): Promise<void> {
    this.attempts += 1
    if (this.failingDeliveries > 0) {
      this.failingDeliveries -= 1
      throw new SinkError('Simulated sink outage', 503)
    }
    this.batches.push(batch)
  }

  /**
   * Make the next `count` deliveries fail with SinkError
   */
  failNextDeliveries(count: number): void {
    this.failingDeliveries = count
  }

  get events(): ChangeEvent[] {
    return this.batches.flatMap((batch) => batch.events)
  }
}
