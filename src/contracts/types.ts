import { HashAlgorithm, SymlinkPolicy } from '../snapshot/types'

export type ChangeEventType = 'created' | 'modified' | 'deleted'

export interface CreatedEvent {
  readonly eventType: 'created'
  readonly path: string
  readonly newHash: string
  readonly timestamp: string
}

export interface ModifiedEvent {
  readonly eventType: 'modified'
  readonly path: string
  readonly oldHash: string
  readonly newHash: string
  readonly timestamp: string
}

export interface DeletedEvent {
  readonly eventType: 'deleted'
  readonly path: string
  readonly oldHash: string
  readonly timestamp: string
}

export type ChangeEvent = CreatedEvent | ModifiedEvent | DeletedEvent

export interface EventBatch {
  root: string
  detectedAt: string
  events: readonly ChangeEvent[]
}

/**
 * Event as the collector's /log endpoint expects it
 */
export interface WireEvent {
  timestamp: string
  event_type: ChangeEventType
  path: string
  old_hash: string | null
  new_hash: string | null
  root: string
}

export type DeliveryPolicy = 'at-least-once' | 'best-effort'

export type InitialBaselinePolicy = 'silent' | 'report'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export interface SinkConfig {
  endpoint?: string
  timeoutMs: number
}

export interface MonitorConfig {
  root: string
  baselinePath?: string
  intervalMs: number
  workers: number
  symlinks: SymlinkPolicy
  readTimeoutMs: number
  chunkSize: number
  hashAlgorithm: HashAlgorithm
  ignore: string[]
  useGitignore: boolean
  delivery: DeliveryPolicy
  initialBaseline: InitialBaselinePolicy
  sink: SinkConfig
  logLevel: LogLevel
}

/**
 * Config with every path resolved, one per monitored root
 */
export interface ResolvedMonitorConfig extends MonitorConfig {
  baselinePath: string
}
