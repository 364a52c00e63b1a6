import { EventSink } from './EventSink'
import { EventBatch } from '../contracts/types'
import { describeEvent } from '../diff/events'
import { logger as defaultLogger, Logger } from '../logging/logger'

/**
 * Used when no collector endpoint is configured
 */
export class LogEventSink implements EventSink {
  readonly name = 'log'

  constructor(private readonly logger: Logger = defaultLogger) {}

  async deliver(batch: EventBatch): Promise<void> {
    for (const event of batch.events) {
      this.logger.info(describeEvent(event), { root: batch.root, timestamp: event.timestamp })
    }
  }
}
