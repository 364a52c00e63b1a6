import { Command } from './types'
import { singleConfig } from './context'
import { preflight } from '../config/preflight'
import { describeEvent } from '../diff/events'
import { errorMessage } from '../errors'

export const ScanCommand: Command = {
  name: 'scan',
  description: 'Run a single scan-diff-report cycle against the baseline',
  execute: async (context) => {
    const config = singleConfig(context)
    await preflight(config)

    const loop = context.createLoop(config)
    const outcome = await loop.runOnce()

    if (outcome.error !== undefined) {
      return {
        exitCode: 1,
        output: `Scan of ${config.root} failed: ${errorMessage(outcome.error)}`,
      }
    }

    let message = outcome.events.length === 0
      ? `No changes detected in ${config.root}\n`
      : `${outcome.events.length} change${outcome.events.length === 1 ? '' : 's'} detected in ${config.root}:\n`

    for (const event of outcome.events) {
      message += `   ${describeEvent(event)}\n`
    }

    if (outcome.issues.length > 0) {
      message += `\nSkipped this cycle:\n`
      for (const issue of outcome.issues) {
        message += `   ${issue.path}: ${issue.error.message}\n`
      }
    }

    if (!outcome.delivered) {
      message += '\nEvents could not be delivered; the baseline was kept for redelivery.\n'
    } else if (!outcome.next.persisted) {
      message += `\nBaseline could not be written to ${loop.baselineLocation}; it will be retried.\n`
    }

    return {
      exitCode: outcome.delivered && outcome.next.persisted ? 0 : 1,
      output: message.trimEnd(),
    }
  }
}
