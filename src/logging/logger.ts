import winston from 'winston'
import path from 'path'
import os from 'os'
import { LogLevel } from '../contracts/types'

// Debug logging - only enabled when FIMON_DEBUG environment variable is set
export const DEBUG = process.env.FIMON_DEBUG === 'true' || process.env.FIMON_DEBUG === '1'

export const DEFAULT_DEBUG_LOG = path.join(os.homedir(), '.fimon', 'debug.log')

export type Logger = winston.Logger

export interface LoggerOptions {
  level?: LogLevel
  debugFile?: string
  silent?: boolean
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      // stdout is reserved for command output
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
          return `${String(timestamp)} ${level}: ${String(message)}${extra}`
        })
      ),
    }),
  ]

  if (options.debugFile) {
    transports.push(
      new winston.transports.File({
        filename: options.debugFile,
        level: 'debug',
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    )
  }

  return winston.createLogger({
    level: DEBUG ? 'debug' : options.level ?? 'info',
    silent: options.silent ?? false,
    transports,
  })
}

export const logger = createLogger({
  debugFile: DEBUG ? DEFAULT_DEBUG_LOG : undefined,
})

/**
 * Apply the configured level to the shared logger
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = DEBUG ? 'debug' : level
}
