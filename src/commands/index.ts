export * from './types'
export { createCommandContext } from './context'
export { WatchCommand } from './WatchCommand'
export { ScanCommand } from './ScanCommand'
export { BaselineCommand } from './BaselineCommand'
export { StatusCommand } from './StatusCommand'

import { WatchCommand } from './WatchCommand'
import { ScanCommand } from './ScanCommand'
import { BaselineCommand } from './BaselineCommand'
import { StatusCommand } from './StatusCommand'

export const defaultCommands = [
  WatchCommand,
  ScanCommand,
  BaselineCommand,
  StatusCommand,
]
