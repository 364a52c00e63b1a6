import { Command } from './types'
import { singleConfig } from './context'
import { preflight } from '../config/preflight'

export const BaselineCommand: Command = {
  name: 'baseline',
  description: 'Replace the baseline with a fresh scan, without reporting changes',
  execute: async (context) => {
    const config = singleConfig(context)
    await preflight(config)

    const loop = context.createLoop(config)
    const { snapshot, issues } = await loop.rebaseline()

    let message = `Baseline updated successfully!

  • Root: ${snapshot.root}
  • Files tracked: ${snapshot.files.size}
  • Hash algorithm: ${snapshot.hashAlgorithm}
  • Stored at: ${loop.baselineLocation}
`
    if (issues.length > 0) {
      message += `  • Files not readable: ${issues.length}\n`
    }

    return { exitCode: 0, output: message.trimEnd() }
  }
}
