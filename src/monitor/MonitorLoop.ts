import { EventEmitter } from 'events'
import { setTimeout as delay } from 'timers/promises'
import { ChangeEvent, DeliveryPolicy, InitialBaselinePolicy, ResolvedMonitorConfig } from '../contracts/types'
import { Snapshot, ScanIssue, ScanReport } from '../snapshot/types'
import { SnapshotBuilder } from '../snapshot/SnapshotBuilder'
import { emptySnapshot } from '../snapshot/snapshot'
import { acceptSnapshot, diffSnapshots, summarize } from '../diff/DiffEngine'
import { BaselineStore } from '../storage/BaselineStore'
import { FileBaselineStore } from '../storage/FileBaselineStore'
import { EventSink } from '../sink/EventSink'
import { createEventSink } from '../sink'
import { FormatError, SinkError, errorMessage } from '../errors'
import { logger as defaultLogger, Logger } from '../logging/logger'

export type MonitorState = 'idle' | 'scanning' | 'diffing' | 'reporting' | 'persisting'

/**
 * The baseline a cycle diffs against. Owned by the caller and handed from one
 * cycle to the next; nothing else holds it.
 */
export interface BaselineState {
  snapshot: Snapshot
  /** Whether this snapshot is what the store currently holds */
  persisted: boolean
  /** No usable baseline existed (first run or forced rebaseline) */
  fresh: boolean
}

export interface CycleOutcome {
  next: BaselineState
  events: ChangeEvent[]
  issues: ScanIssue[]
  /** False when the sink rejected this cycle's events */
  delivered: boolean
  /** Set when the scan itself failed and the baseline was left unchanged */
  error?: unknown
}

export interface MonitorLoopOptions {
  root: string
  builder: SnapshotBuilder
  store: BaselineStore
  sink: EventSink
  intervalMs?: number
  delivery?: DeliveryPolicy
  initialBaseline?: InitialBaselinePolicy
  logger?: Logger
}

/**
 * Poll loop for one monitored root: scan, diff against the baseline, report,
 * persist, sleep. Emits `state` on every transition and `cycle` with each
 * CycleOutcome.
 */
export class MonitorLoop extends EventEmitter {
  readonly root: string
  private readonly builder: SnapshotBuilder
  private readonly store: BaselineStore
  private readonly sink: EventSink
  private readonly intervalMs: number
  private readonly delivery: DeliveryPolicy
  private readonly initialBaseline: InitialBaselinePolicy
  private readonly logger: Logger
  private state: MonitorState = 'idle'

  constructor(options: MonitorLoopOptions) {
    super()
    this.root = options.root
    this.builder = options.builder
    this.store = options.store
    this.sink = options.sink
    this.intervalMs = options.intervalMs ?? 5000
    this.delivery = options.delivery ?? 'at-least-once'
    this.initialBaseline = options.initialBaseline ?? 'silent'
    this.logger = options.logger ?? defaultLogger
  }

  static fromConfig(
    config: ResolvedMonitorConfig,
    overrides: { store?: BaselineStore; sink?: EventSink; logger?: Logger } = {}
  ): MonitorLoop {
    const logger = (overrides.logger ?? defaultLogger).child({ root: config.root })
    return new MonitorLoop({
      root: config.root,
      builder: new SnapshotBuilder({
        root: config.root,
        hashAlgorithm: config.hashAlgorithm,
        chunkSize: config.chunkSize,
        readTimeoutMs: config.readTimeoutMs,
        workers: config.workers,
        symlinks: config.symlinks,
        ignore: config.ignore,
        useGitignore: config.useGitignore,
        excludePaths: [config.baselinePath],
        logger,
      }),
      store: overrides.store ?? new FileBaselineStore({
        filePath: config.baselinePath,
        hashAlgorithm: config.hashAlgorithm,
        logger,
      }),
      sink: overrides.sink ?? createEventSink(config.sink, logger),
      intervalMs: config.intervalMs,
      delivery: config.delivery,
      initialBaseline: config.initialBaseline,
      logger,
    })
  }

  getState(): MonitorState {
    return this.state
  }

  get baselineLocation(): string {
    return this.store.location
  }

  /**
   * Load the persisted baseline. A missing baseline is the normal first-run
   * state; an unusable one is discarded and rebuilt from the next scan.
   */
  async loadBaseline(): Promise<BaselineState> {
    let loaded: Snapshot | null
    try {
      loaded = await this.store.load()
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error
      }
      this.logger.warn(`${error.message}; forcing a full rebaseline`)
      return this.freshBaseline()
    }

    if (!loaded) {
      this.logger.info('No baseline found; the first scan becomes the baseline', {
        location: this.store.location,
      })
      return this.freshBaseline()
    }

    if (loaded.root !== this.root) {
      this.logger.warn(
        `Baseline at ${this.store.location} belongs to ${loaded.root}; forcing a full rebaseline`
      )
      return this.freshBaseline()
    }

    this.logger.info(`Loaded baseline with ${loaded.files.size} files`, {
      location: this.store.location,
      createdAt: loaded.createdAt,
    })
    return { snapshot: loaded, persisted: true, fresh: false }
  }

  /**
   * One full cycle. Takes the current baseline and returns the next one;
   * per-cycle failures are logged and left for the next cycle to retry.
   */
  async runCycle(baseline: BaselineState): Promise<CycleOutcome> {
    let current = baseline
    if (!current.persisted) {
      this.transition('persisting')
      current = { ...current, persisted: await this.persist(current.snapshot, 'Retrying baseline persist') }
    }

    this.transition('scanning')
    let report: ScanReport
    try {
      report = await this.builder.build()
    } catch (error) {
      this.logger.error(`Scan failed, baseline unchanged: ${errorMessage(error)}`)
      return this.finish({ next: current, events: [], issues: [], delivered: true, error })
    }

    this.transition('diffing')
    const silent = current.fresh && this.initialBaseline === 'silent'
    const events = silent ? [] : diffSnapshots(current.snapshot, report.snapshot)
    if (silent) {
      this.logger.info(`Baseline created with ${report.snapshot.files.size} files; later scans will report changes`)
    }

    this.transition('reporting')
    const delivered = await this.report(events, report.snapshot.createdAt)

    if (!delivered && this.delivery === 'at-least-once') {
      this.logger.warn('Keeping previous baseline so undelivered events are re-derived next cycle')
      return this.finish({ next: current, events, issues: report.issues, delivered })
    }

    this.transition('persisting')
    const accepted = acceptSnapshot(current.snapshot, report.snapshot)
    const persisted = await this.persist(accepted, 'Baseline persist failed')

    return this.finish({
      next: { snapshot: accepted, persisted, fresh: false },
      events,
      issues: report.issues,
      delivered,
    })
  }

  /**
   * Load the baseline and run a single cycle
   */
  async runOnce(): Promise<CycleOutcome> {
    return this.runCycle(await this.loadBaseline())
  }

  /**
   * Replace the baseline with a fresh scan without reporting anything.
   * Files that could not be read keep their previous fingerprints.
   * Throws PersistError when the new baseline cannot be written.
   */
  async rebaseline(): Promise<ScanReport> {
    const previous = await this.loadBaseline()
    this.transition('scanning')
    try {
      const report = await this.builder.build()
      this.transition('persisting')
      const snapshot = acceptSnapshot(previous.snapshot, report.snapshot)
      await this.store.save(snapshot)
      this.logger.info(`Baseline replaced with ${snapshot.files.size} files`)
      return { snapshot, issues: report.issues }
    } finally {
      this.transition('idle')
    }
  }

  /**
   * Run cycles until the signal aborts. The signal is honoured between cycles
   * and during the sleep; a cycle in progress always completes.
   */
  async start(signal: AbortSignal): Promise<BaselineState> {
    let baseline = await this.loadBaseline()
    this.logger.info(`Monitoring ${this.root} every ${this.intervalMs}ms`)

    while (!signal.aborted) {
      const outcome = await this.runCycle(baseline)
      baseline = outcome.next
      if (signal.aborted) {
        break
      }
      await this.sleep(signal)
    }

    this.logger.info('Monitor stopped')
    return baseline
  }

  private async report(events: ChangeEvent[], detectedAt: string): Promise<boolean> {
    if (events.length === 0) {
      return true
    }

    try {
      await this.sink.deliver({ root: this.root, detectedAt, events })
    } catch (error) {
      const sinkError = error instanceof SinkError
        ? error
        : new SinkError(errorMessage(error), undefined, { cause: error })
      this.logger.warn(`Event delivery to ${this.sink.name} sink failed: ${sinkError.message}`, {
        events: events.length,
        delivery: this.delivery,
      })
      return false
    }

    this.logger.info(`Reported ${events.length} change events`, summarize(events))
    return true
  }

  private async persist(snapshot: Snapshot, failureMessage: string): Promise<boolean> {
    try {
      await this.store.save(snapshot)
      return true
    } catch (error) {
      this.logger.warn(`${failureMessage}; will retry next cycle: ${errorMessage(error)}`, {
        location: this.store.location,
      })
      return false
    }
  }

  private async sleep(signal: AbortSignal): Promise<void> {
    try {
      await delay(this.intervalMs, undefined, { signal })
    } catch (error) {
      if (!signal.aborted) {
        throw error
      }
    }
  }

  private freshBaseline(): BaselineState {
    return {
      snapshot: emptySnapshot(this.root, this.builder.hashAlgorithm),
      persisted: true,
      fresh: true,
    }
  }

  private finish(outcome: CycleOutcome): CycleOutcome {
    this.transition('idle')
    this.emit('cycle', outcome)
    return outcome
  }

  private transition(next: MonitorState): void {
    if (this.state === next) {
      return
    }
    this.logger.debug(`State ${this.state} -> ${next}`)
    this.state = next
    this.emit('state', next)
  }
}
