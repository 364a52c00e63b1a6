/**
 * Error taxonomy for the monitor. Per-file errors (ReadError, PermissionError)
 * are soft, per-cycle errors (PersistError, SinkError) are retried on the next
 * cycle, FormatError forces a rebaseline and ConfigError is fatal at startup.
 */

export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'MonitorError'
  }
}

export type ReadErrorReason = 'vanished' | 'unreadable' | 'timeout' | 'race'

export class ReadError extends MonitorError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: ReadErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.READ_ERROR, options)
    this.name = 'ReadError'
  }
}

export class PermissionError extends MonitorError {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.PERMISSION_ERROR, options)
    this.name = 'PermissionError'
  }
}

export class PersistError extends MonitorError {
  constructor(message: string, public readonly location: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.PERSIST_ERROR, options)
    this.name = 'PersistError'
  }
}

export class SinkError extends MonitorError {
  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(message, ErrorCodes.SINK_ERROR, options)
    this.name = 'SinkError'
  }
}

export class FormatError extends MonitorError {
  constructor(message: string, public readonly location: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.FORMAT_ERROR, options)
    this.name = 'FormatError'
  }
}

export class ConfigError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.CONFIG_ERROR, options)
    this.name = 'ConfigError'
  }
}

// Error codes for easy reference
export const ErrorCodes = {
  READ_ERROR: 'READ_ERROR',
  PERMISSION_ERROR: 'PERMISSION_ERROR',
  PERSIST_ERROR: 'PERSIST_ERROR',
  SINK_ERROR: 'SINK_ERROR',
  FORMAT_ERROR: 'FORMAT_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const

/**
 * Per-file failures that exclude a path from a snapshot without failing the walk
 */
export function isSoftFileError(error: unknown): error is ReadError | PermissionError {
  return error instanceof ReadError || error instanceof PermissionError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
