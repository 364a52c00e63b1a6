export * from './contracts'
export * from './errors'
export type { FileFingerprint, HashAlgorithm, ScanIssue, ScanReport, Snapshot, SymlinkPolicy } from './snapshot/types'
export { createSnapshot, emptySnapshot, isSkipped, compareCodeUnits } from './snapshot/snapshot'
export { Fingerprinter } from './snapshot/Fingerprinter'
export type { FingerprinterOptions } from './snapshot/Fingerprinter'
export { IgnoreMatcher } from './snapshot/IgnoreMatcher'
export type { IgnoreMatcherOptions } from './snapshot/IgnoreMatcher'
export { SnapshotBuilder } from './snapshot/SnapshotBuilder'
export type { SnapshotBuilderOptions } from './snapshot/SnapshotBuilder'
export { diffSnapshots, acceptSnapshot, summarize } from './diff/DiffEngine'
export type { DiffSummary } from './diff/DiffEngine'
export { createdEvent, modifiedEvent, deletedEvent, describeEvent, toWireEvent } from './diff/events'
export type { BaselineStore } from './storage/BaselineStore'
export { FileBaselineStore } from './storage/FileBaselineStore'
export { MemoryBaselineStore } from './storage/MemoryBaselineStore'
export { encodeBaseline, decodeBaseline, BASELINE_FORMAT_VERSION } from './storage/BaselineCodec'
export * from './sink'
export { MonitorLoop } from './monitor/MonitorLoop'
export type { MonitorLoopOptions, MonitorState, BaselineState, CycleOutcome } from './monitor/MonitorLoop'
export { ConfigLoader, defaultBaselinePath } from './config/ConfigLoader'
export type { ConfigOverrides } from './config/ConfigLoader'
export { preflight } from './config/preflight'
export { createLogger, logger } from './logging/logger'
export type { Logger } from './logging/logger'
export { createCommandContext, defaultCommands } from './commands'
export type { Command, CommandContext, CommandResult } from './commands'
