import { promises as fs, Dirent, Stats } from 'fs'
import path from 'path'
import PQueue from 'p-queue'
import { FileFingerprint, HashAlgorithm, ScanIssue, ScanReport, SymlinkPolicy } from './types'
import { Fingerprinter, toFileError } from './Fingerprinter'
import { IgnoreMatcher } from './IgnoreMatcher'
import { compareCodeUnits, createSnapshot } from './snapshot'
import { ReadError } from '../errors'
import { logger as defaultLogger, Logger } from '../logging/logger'

export interface SnapshotBuilderOptions {
  root: string
  hashAlgorithm?: HashAlgorithm
  chunkSize?: number
  readTimeoutMs?: number
  workers?: number
  symlinks?: SymlinkPolicy
  ignore?: string[]
  useGitignore?: boolean
  /** Absolute paths never included, such as the baseline file */
  excludePaths?: string[]
  fingerprinter?: Fingerprinter
  logger?: Logger
}

interface WalkState {
  queue: PQueue
  tasks: Promise<void>[]
  files: Map<string, FileFingerprint>
  skipped: Set<string>
  issues: ScanIssue[]
  visited: Set<string>
}

export class SnapshotBuilder {
  private readonly root: string
  private readonly fingerprinter: Fingerprinter
  private readonly ignoreMatcher: IgnoreMatcher
  private readonly workers: number
  private readonly symlinks: SymlinkPolicy
  private readonly logger: Logger

  constructor(options: SnapshotBuilderOptions) {
    this.root = path.resolve(options.root)
    this.workers = options.workers ?? 4
    this.symlinks = options.symlinks ?? 'skip'
    this.logger = options.logger ?? defaultLogger
    this.fingerprinter = options.fingerprinter ?? new Fingerprinter({
      hashAlgorithm: options.hashAlgorithm,
      chunkSize: options.chunkSize,
      readTimeoutMs: options.readTimeoutMs,
    })
    this.ignoreMatcher = new IgnoreMatcher(this.root, {
      patterns: options.ignore,
      useGitignore: options.useGitignore,
      logger: this.logger,
    })
    for (const excluded of options.excludePaths ?? []) {
      this.ignoreMatcher.excludeFile(path.resolve(excluded))
    }
  }

  get hashAlgorithm(): HashAlgorithm {
    return this.fingerprinter.hashAlgorithm
  }

  /**
   * Walk the root and fingerprint every regular file under it. Per-file
   * failures are reported as issues; only a root that cannot be listed fails
   * the build.
   */
  async build(): Promise<ScanReport> {
    const createdAt = new Date().toISOString()
    const state: WalkState = {
      queue: new PQueue({ concurrency: this.workers }),
      tasks: [],
      files: new Map(),
      skipped: new Set(),
      issues: [],
      visited: new Set(),
    }

    if (this.symlinks === 'follow') {
      try {
        state.visited.add(await fs.realpath(this.root))
      } catch (error) {
        throw toFileError(error, '.')
      }
    }

    await this.walk(this.root, '', state)
    await Promise.all(state.tasks)

    state.issues.sort((a, b) => compareCodeUnits(a.path, b.path))

    this.logger.debug('Snapshot built', {
      root: this.root,
      fileCount: state.files.size,
      skipped: state.skipped.size,
      issues: state.issues.length,
    })

    return {
      snapshot: createSnapshot({
        root: this.root,
        hashAlgorithm: this.hashAlgorithm,
        createdAt,
        files: state.files.values(),
        skipped: state.skipped,
      }),
      issues: state.issues,
    }
  }

  private async walk(absoluteDir: string, relativeDir: string, state: WalkState): Promise<void> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(absoluteDir, { withFileTypes: true })
    } catch (error) {
      const fileError = toFileError(error, relativeDir || '.')
      if (!relativeDir) {
        // Root failures are per-cycle, not per-file
        throw fileError
      }
      if (fileError instanceof ReadError && fileError.reason === 'vanished') {
        this.logger.warn(`Directory vanished during scan: ${relativeDir}`)
        state.issues.push({ path: relativeDir, error: fileError })
        return
      }
      state.skipped.add(`${relativeDir}/`)
      state.issues.push({ path: relativeDir, error: fileError })
      this.logger.warn(`Skipping unreadable directory: ${relativeDir}`, { error: fileError.message })
      return
    }

    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name
      const absolutePath = path.join(absoluteDir, entry.name)

      if (entry.isSymbolicLink()) {
        if (this.symlinks === 'follow') {
          await this.followLink(absolutePath, relativePath, state)
        }
        continue
      }

      if (entry.isDirectory()) {
        if (this.ignoreMatcher.isIgnored(relativePath, true)) {
          continue
        }
        if (this.symlinks === 'follow' && !(await this.markVisited(absolutePath, relativePath, state))) {
          continue
        }
        await this.walk(absolutePath, relativePath, state)
      } else if (entry.isFile()) {
        if (!this.ignoreMatcher.isIgnored(relativePath)) {
          this.schedule(absolutePath, relativePath, state)
        }
      } else {
        this.logger.debug(`Skipping special file: ${relativePath}`)
      }
    }
  }

  private async followLink(absolutePath: string, relativePath: string, state: WalkState): Promise<void> {
    let target: Stats
    try {
      target = await fs.stat(absolutePath)
    } catch (error) {
      // Dangling links have no content to track
      this.logger.debug(`Skipping unresolvable symlink: ${relativePath}`, {
        error: toFileError(error, relativePath).message,
      })
      return
    }

    if (target.isDirectory()) {
      if (this.ignoreMatcher.isIgnored(relativePath, true)) {
        return
      }
      if (await this.markVisited(absolutePath, relativePath, state)) {
        await this.walk(absolutePath, relativePath, state)
      }
    } else if (target.isFile() && !this.ignoreMatcher.isIgnored(relativePath)) {
      this.schedule(absolutePath, relativePath, state)
    }
  }

  private schedule(absolutePath: string, relativePath: string, state: WalkState): void {
    state.tasks.push(
      state.queue.add(async () => {
        try {
          state.files.set(relativePath, await this.fingerprinter.fingerprint(absolutePath, relativePath))
        } catch (error) {
          const fileError = toFileError(error, relativePath)
          state.issues.push({ path: relativePath, error: fileError })

          if (fileError instanceof ReadError && fileError.reason === 'vanished') {
            this.logger.warn(`File vanished during scan: ${relativePath}`)
            return
          }
          state.skipped.add(relativePath)
          this.logger.warn(`Skipping file this cycle: ${relativePath}`, {
            code: fileError.code,
            error: fileError.message,
          })
        }
      })
    )
  }

  /**
   * Record a directory's real path. Returns false when it was already walked
   * (a symlink cycle or a second link to the same place) or cannot be resolved.
   */
  private async markVisited(absolutePath: string, relativePath: string, state: WalkState): Promise<boolean> {
    let real: string
    try {
      real = await fs.realpath(absolutePath)
    } catch (error) {
      const fileError = toFileError(error, relativePath)
      state.issues.push({ path: relativePath, error: fileError })
      if (!(fileError instanceof ReadError && fileError.reason === 'vanished')) {
        state.skipped.add(`${relativePath}/`)
      }
      this.logger.warn(`Unable to resolve directory: ${relativePath}`, { error: fileError.message })
      return false
    }

    if (state.visited.has(real)) {
      this.logger.debug(`Directory already walked, skipping: ${relativePath}`)
      return false
    }
    state.visited.add(real)
    return true
  }
}
