import fs from 'fs'
import path from 'path'
import os from 'os'
import crypto from 'crypto'
import { z } from 'zod'
import { MonitorConfig, ResolvedMonitorConfig } from '../contracts/types'
import { MonitorConfigSchema } from '../contracts/schemas'
import { ConfigError } from '../errors'

export const DEFAULT_BASELINE_DIR = path.join(os.homedir(), '.fimon', 'baselines')

/**
 * Values taken from the command line. They win over the config file.
 */
export type ConfigOverrides = Partial<Omit<MonitorConfig, 'sink'>> & {
  sink?: Partial<MonitorConfig['sink']>
}

export class ConfigLoader {
  private static readonly CONFIG_NAMES = ['.fimon.config.json', 'fimon.config.json']

  private fileConfig: Record<string, unknown>
  private readonly sourcePath: string | null

  constructor(
    private configPath?: string,
    private cwd: string = process.cwd()
  ) {
    this.sourcePath = this.configPath ?? this.findConfigFile()
    this.fileConfig = this.readConfigFile()
  }

  private findConfigFile(): string | null {
    // Start from current directory and walk up
    let currentDir = this.cwd

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of ConfigLoader.CONFIG_NAMES) {
        const candidate = path.join(currentDir, configName)
        if (fs.existsSync(candidate)) {
          return candidate
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private readConfigFile(): Record<string, unknown> {
    if (!this.sourcePath) {
      return {}
    }

    if (!fs.existsSync(this.sourcePath)) {
      if (this.configPath) {
        throw new ConfigError(`Config file not found: ${this.sourcePath}`)
      }
      return {}
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(fs.readFileSync(this.sourcePath, 'utf-8'))
    } catch (error) {
      throw new ConfigError(`Invalid JSON in config file ${this.sourcePath}`, { cause: error })
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${this.sourcePath} must contain a JSON object`)
    }
    return Object.fromEntries(Object.entries(parsed))
  }

  getConfigPath(): string | null {
    return this.sourcePath
  }

  /**
   * Validate the file config merged with overrides and apply defaults
   */
  getConfig(overrides: ConfigOverrides = {}): MonitorConfig {
    const fileSink = this.fileConfig.sink
    const merged: Record<string, unknown> = {
      ...this.fileConfig,
      ...stripUndefined(overrides),
    }
    if (overrides.sink) {
      merged.sink = {
        ...(typeof fileSink === 'object' && fileSink !== null ? fileSink : {}),
        ...stripUndefined(overrides.sink),
      }
    }

    try {
      return MonitorConfigSchema.parse(merged)
    } catch (error) {
      if (error instanceof z.ZodError) {
        const details = error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        throw new ConfigError(
          `Invalid config${this.sourcePath ? ` at ${this.sourcePath}` : ''}: ${details.join('; ')}`,
          { cause: error }
        )
      }
      throw error
    }
  }

  /**
   * Resolve one config per monitored root. Roots are absolute and every root
   * gets its own baseline file unless one is given explicitly.
   */
  resolveRoots(roots: string[], overrides: ConfigOverrides = {}): ResolvedMonitorConfig[] {
    const base = this.getConfig(overrides)
    const targets = roots.length > 0 ? roots : [base.root]

    if (targets.length > 1 && base.baselinePath) {
      throw new ConfigError('A single baseline path cannot be shared by several monitored roots')
    }

    const resolved = targets.map((root) => {
      const absoluteRoot = path.resolve(this.cwd, root)
      return {
        ...base,
        root: absoluteRoot,
        baselinePath: base.baselinePath
          ? path.resolve(this.cwd, base.baselinePath)
          : defaultBaselinePath(absoluteRoot),
      }
    })

    const uniqueRoots = new Set(resolved.map((config) => config.root))
    if (uniqueRoots.size !== resolved.length) {
      throw new ConfigError('The same root is listed more than once')
    }

    return resolved
  }

  reloadConfig(): void {
    this.fileConfig = this.readConfigFile()
  }
}

export function defaultBaselinePath(absoluteRoot: string): string {
  const digest = crypto.createHash('sha1').update(absoluteRoot).digest('hex').slice(0, 12)
  return path.join(DEFAULT_BASELINE_DIR, `${digest}.json`)
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined)
  )
}
