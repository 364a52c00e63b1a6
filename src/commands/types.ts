import { ResolvedMonitorConfig } from '../contracts/types'
import { MonitorLoop } from '../monitor/MonitorLoop'
import { BaselineStore } from '../storage/BaselineStore'
import { Logger } from '../logging/logger'

export interface CommandContext {
  /** One resolved config per monitored root */
  configs: ResolvedMonitorConfig[]
  logger: Logger
  signal: AbortSignal
  createLoop: (config: ResolvedMonitorConfig) => MonitorLoop
  createStore: (config: ResolvedMonitorConfig) => BaselineStore
}

export interface CommandResult {
  exitCode: number
  output: string
}

export interface Command {
  name: string
  description: string
  /** Whether the command accepts several roots */
  multiRoot?: boolean
  execute: (context: CommandContext) => Promise<CommandResult>
}
