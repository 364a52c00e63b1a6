import { Command } from './types'
import { singleConfig } from './context'
import { BASELINE_FORMAT_VERSION } from '../storage/BaselineCodec'
import { FormatError } from '../errors'
import { Snapshot } from '../snapshot/types'

export const StatusCommand: Command = {
  name: 'status',
  description: 'Show the stored baseline for a root',
  execute: async (context) => {
    const config = singleConfig(context)
    const store = context.createStore(config)

    let message = `Root: ${config.root}\n`
    message += `Baseline: ${store.location}\n\n`

    let baseline: Snapshot | null
    try {
      baseline = await store.load()
    } catch (error) {
      if (error instanceof FormatError) {
        message += `Baseline is unusable and will be rebuilt on the next scan:\n   ${error.message}`
        return { exitCode: 1, output: message }
      }
      throw error
    }

    if (!baseline) {
      message += 'No baseline yet. Run "fimon scan" or "fimon baseline" to create one.'
      return { exitCode: 0, output: message }
    }

    message += 'Current Configuration:\n'
    message += `   Interval: ${config.intervalMs / 1000}s\n`
    message += `   Workers: ${config.workers}\n`
    message += `   Symlinks: ${config.symlinks}\n`
    message += `   Delivery: ${config.delivery}\n`
    message += `   Sink: ${config.sink.endpoint ?? 'log'}\n\n`

    message += 'Baseline:\n'
    message += `   Format version: ${BASELINE_FORMAT_VERSION}\n`
    message += `   Hash algorithm: ${baseline.hashAlgorithm}\n`
    message += `   Files tracked: ${baseline.files.size}\n`
    message += `   Created: ${baseline.createdAt}\n`

    return { exitCode: 0, output: message.trimEnd() }
  }
}
