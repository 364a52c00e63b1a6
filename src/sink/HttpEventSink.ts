import { EventSink } from './EventSink'
import { EventBatch } from '../contracts/types'
import { toWireEvent } from '../diff/events'
import { SinkError, errorMessage } from '../errors'
import { logger as defaultLogger, Logger } from '../logging/logger'

export interface HttpEventSinkOptions {
  endpoint: string
  timeoutMs?: number
  logger?: Logger
}

/**
 * Posts events one at a time, in order, to the collector's `/log` endpoint.
 * The first failure stops the batch; events already accepted stay accepted.
 */
export class HttpEventSink implements EventSink {
  readonly name = 'http'
  private readonly url: string
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(options: HttpEventSinkOptions) {
    this.url = new URL('/log', options.endpoint).toString()
    this.timeoutMs = options.timeoutMs ?? 5000
    this.logger = options.logger ?? defaultLogger
  }

  async deliver(batch: EventBatch): Promise<void> {
    for (const [index, event] of batch.events.entries()) {
      let response: Response
      try {
        response = await fetch(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(toWireEvent(event, batch.root)),
          signal: AbortSignal.timeout(this.timeoutMs),
        })
      } catch (error) {
        throw new SinkError(
          `Failed to send event for ${event.path} to ${this.url}: ${errorMessage(error)}`,
          undefined,
          { cause: error }
        )
      }

      if (!response.ok) {
        throw new SinkError(
          `Collector rejected event for ${event.path} with status ${response.status}`,
          response.status
        )
      }

      this.logger.debug('Event delivered', {
        path: event.path,
        status: response.status,
        position: `${index + 1}/${batch.events.length}`,
      })
    }
  }
}
