import { Command } from './types'
import { preflight } from '../config/preflight'

export const WatchCommand: Command = {
  name: 'watch',
  description: 'Monitor one or more roots until interrupted',
  multiRoot: true,
  execute: async (context) => {
    // All roots are checked before any loop starts
    for (const config of context.configs) {
      await preflight(config)
    }

    const loops = context.configs.map((config) => context.createLoop(config))
    await Promise.all(loops.map((loop) => loop.start(context.signal)))

    const count = loops.length
    return {
      exitCode: 0,
      output: `Stopped monitoring ${count} root${count === 1 ? '' : 's'}`,
    }
  }
}
