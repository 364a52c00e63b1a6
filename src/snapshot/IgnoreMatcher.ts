import fs from 'fs'
import path from 'path'
import { logger as defaultLogger, Logger } from '../logging/logger'

interface IgnoreRule {
  pattern: RegExp
  negated: boolean
  directory: boolean
}

export interface IgnoreMatcherOptions {
  patterns?: string[]
  useGitignore?: boolean
  logger?: Logger
}

/**
 * Gitignore-style matching on root-relative, `/`-separated paths
 */
export class IgnoreMatcher {
  private rules: IgnoreRule[] = []
  private readonly logger: Logger

  constructor(private readonly rootDir: string, options: IgnoreMatcherOptions = {}) {
    this.logger = options.logger ?? defaultLogger

    for (const pattern of options.patterns ?? []) {
      this.addPattern(pattern)
    }

    // Loaded last so it can override configured patterns
    if (options.useGitignore) {
      this.loadIgnoreFile(path.join(this.rootDir, '.gitignore'))
    }
  }

  private loadIgnoreFile(ignorePath: string): void {
    if (!fs.existsSync(ignorePath)) {
      return
    }

    try {
      const content = fs.readFileSync(ignorePath, 'utf-8')

      for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim()

        // Skip empty lines and comments
        if (!trimmed || trimmed.startsWith('#')) {
          continue
        }

        this.addPattern(trimmed)
      }
    } catch (error) {
      this.logger.warn(`Unable to read ignore file ${ignorePath}`, {
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  /**
   * Exclude an absolute path (and its temporary siblings) when it lives under
   * the root. Used for the baseline file.
   */
  excludeFile(absolutePath: string): void {
    const relative = path.relative(this.rootDir, absolutePath)
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      return
    }
    const posixPath = relative.split(path.sep).join('/')
    this.addPattern(`/${posixPath}`)
    this.addPattern(`/${posixPath}.*.tmp`)
  }

  addPattern(pattern: string): void {
    let negated = false
    let directory = false
    let workingPattern = pattern

    if (workingPattern.startsWith('!')) {
      negated = true
      workingPattern = workingPattern.slice(1)
    }

    if (workingPattern.endsWith('/')) {
      directory = true
      workingPattern = workingPattern.slice(0, -1)
    }

    if (!workingPattern) {
      return
    }

    this.rules.push({ pattern: this.toRegex(workingPattern), negated, directory })
  }

  private toRegex(pattern: string): RegExp {
    // Escape regex special characters except * and ?
    let regex = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&')

    regex = regex.replace(/\*\*/g, '___DOUBLE_STAR___')
    regex = regex.replace(/\*/g, '[^/]*')
    regex = regex.replace(/\?/g, '[^/]')
    regex = regex.replace(/___DOUBLE_STAR___/g, '.*')

    // Unanchored patterns match at any depth
    if (!pattern.startsWith('/')) {
      regex = `(^|/)${regex}`
    } else {
      regex = `^${regex.slice(1)}`
    }

    if (!pattern.endsWith('*')) {
      regex = `${regex}($|/)`
    }

    return new RegExp(regex)
  }

  /**
   * @param relativePath root-relative path using `/` separators
   * @param isDirectory directory-only rules (`name/`) apply to the entry itself only when true
   */
  isIgnored(relativePath: string, isDirectory: boolean = false): boolean {
    if (relativePath.startsWith('../') || relativePath === '..') {
      return true
    }

    let ignored = false
    const parent = path.posix.dirname(relativePath)

    // Later rules override earlier ones
    for (const { pattern, negated, directory } of this.rules) {
      const subject = directory && !isDirectory ? parent : relativePath
      if (subject !== '.' && pattern.test(subject)) {
        ignored = !negated
      }
    }

    return ignored
  }
}
