import type { EventSink } from './EventSink'
import { HttpEventSink } from './HttpEventSink'
import { LogEventSink } from './LogEventSink'
import { SinkConfig } from '../contracts/types'
import { Logger } from '../logging/logger'

export type { EventSink } from './EventSink'
export { HttpEventSink } from './HttpEventSink'
export { LogEventSink } from './LogEventSink'
export { MemoryEventSink } from './MemoryEventSink'

export function createEventSink(config: SinkConfig, logger?: Logger): EventSink {
  if (!config.endpoint) {
    return new LogEventSink(logger)
  }
  return new HttpEventSink({ endpoint: config.endpoint, timeoutMs: config.timeoutMs, logger })
}
