import { CommandContext } from './types'
import { ResolvedMonitorConfig } from '../contracts/types'
import { MonitorLoop } from '../monitor/MonitorLoop'
import { FileBaselineStore } from '../storage/FileBaselineStore'
import { Logger } from '../logging/logger'

export function createCommandContext(
  configs: ResolvedMonitorConfig[],
  logger: Logger,
  signal: AbortSignal
): CommandContext {
  return {
    configs,
    logger,
    signal,
    createLoop: (config) => MonitorLoop.fromConfig(config, { logger }),
    createStore: (config) => new FileBaselineStore({
      filePath: config.baselinePath,
      hashAlgorithm: config.hashAlgorithm,
      logger,
    }),
  }
}

export function singleConfig(context: CommandContext): ResolvedMonitorConfig {
  const [config] = context.configs
  if (!config || context.configs.length > 1) {
    throw new Error('This command takes exactly one root')
  }
  return config
}
