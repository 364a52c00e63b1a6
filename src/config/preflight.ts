import { promises as fs, constants, Stats } from 'fs'
import path from 'path'
import { ResolvedMonitorConfig } from '../contracts/types'
import { ConfigError, errorMessage } from '../errors'

/**
 * Startup checks that must pass before a monitor loop starts. Failures here
 * are fatal and reported before any cycle runs.
 */
export async function preflight(config: ResolvedMonitorConfig): Promise<void> {
  let stats: Stats
  try {
    stats = await fs.stat(config.root)
  } catch (error) {
    throw new ConfigError(`Monitored root does not exist: ${config.root}`, { cause: error })
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`Monitored root is not a directory: ${config.root}`)
  }

  const baselineDir = path.dirname(config.baselinePath)
  try {
    await fs.mkdir(baselineDir, { recursive: true })
    await fs.access(baselineDir, constants.W_OK)
  } catch (error) {
    throw new ConfigError(
      `Baseline location is not writable: ${baselineDir} (${errorMessage(error)})`,
      { cause: error }
    )
  }
}
