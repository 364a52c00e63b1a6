#!/usr/bin/env node

import fs from 'fs'
import path from 'path'
import { Command as Program } from 'commander'
import { Command, CommandResult, createCommandContext, defaultCommands } from '../commands'
import { ConfigLoader, ConfigOverrides } from '../config/ConfigLoader'
import { ConfigError, MonitorError, errorMessage } from '../errors'
import { logger, setLogLevel } from '../logging/logger'

export interface CliOptions {
  config?: string
  baseline?: string
  server?: string
  interval?: string
  workers?: string
  followSymlinks?: boolean
  gitignore?: boolean
}

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8'))
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version
    }
  } catch (error) {
    logger.debug('Unable to read package version', { error: errorMessage(error) })
  }
  return '0.0.0'
}

function parseNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined
  }
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${flag} expects a number, got "${value}"`)
  }
  return parsed
}

/**
 * Translate command line flags into config overrides
 */
export function toOverrides(options: CliOptions): ConfigOverrides {
  const intervalSeconds = parseNumber(options.interval, '--interval')
  return {
    baselinePath: options.baseline,
    intervalMs: intervalSeconds === undefined ? undefined : Math.round(intervalSeconds * 1000),
    workers: parseNumber(options.workers, '--workers'),
    symlinks: options.followSymlinks ? 'follow' : undefined,
    useGitignore: options.gitignore ? true : undefined,
    sink: options.server ? { endpoint: options.server } : undefined,
  }
}

export async function run(
  command: Command,
  roots: string[],
  options: CliOptions,
  signal: AbortSignal
): Promise<CommandResult> {
  const loader = new ConfigLoader(options.config)
  const configs = loader.resolveRoots(roots, toOverrides(options))
  if (!command.multiRoot && configs.length > 1) {
    throw new ConfigError(`"${command.name}" takes a single root`)
  }

  const [first] = configs
  if (first) {
    setLogLevel(first.logLevel)
  }
  logger.debug('Resolved configuration', { configPath: loader.getConfigPath(), configs })

  return command.execute(createCommandContext(configs, logger, signal))
}

export function createProgram(signal: AbortSignal): Program {
  const program = new Program()
  program
    .name('fimon')
    .description('Detect created, modified and deleted files by diffing snapshots against a baseline')
    .version(readVersion())

  for (const command of defaultCommands) {
    program
      .command(command.multiRoot ? `${command.name} [roots...]` : `${command.name} [root]`)
      .description(command.description)
      .option('-c, --config <path>', 'Path to configuration JSON file')
      .option('-b, --baseline <path>', 'Path to the baseline file')
      .option('-s, --server <url>', 'Collector base URL; events are logged when omitted')
      .option('-i, --interval <seconds>', 'Seconds between scans')
      .option('-w, --workers <n>', 'Number of files hashed concurrently')
      .option('--follow-symlinks', 'Follow symbolic links instead of skipping them')
      .option('--gitignore', 'Also honour the root .gitignore')
      .action(async (rootArg: string | string[] | undefined, options: CliOptions) => {
        const roots = rootArg === undefined ? [] : Array.isArray(rootArg) ? rootArg : [rootArg]
        const result = await run(command, roots, options, signal)
        console.log(result.output)
        process.exitCode = result.exitCode
      })
  }

  return program
}

// Only run if this is the main module
if (require.main === module) {
  const controller = new AbortController()
  const stop = () => {
    logger.info('Stopping after the current cycle...')
    controller.abort()
  }
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)

  createProgram(controller.signal)
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      if (error instanceof ConfigError) {
        console.error(`fimon: configuration error: ${error.message}`)
        process.exitCode = 2
      } else if (error instanceof MonitorError) {
        console.error(`fimon: ${error.message}`)
        process.exitCode = 1
      } else {
        console.error('fimon: unexpected failure:', error)
        process.exitCode = 1
      }
    })
}
