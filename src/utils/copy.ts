import fs from 'fs-extra'
import { globby } from 'globby'
import * as path from 'path'
import { pipeline } from 'stream/promises'
import type { Caption } from '../progress/commands.js'
import type { ProgressReader } from '../progress/reader.js'

/**
 * Copy Engine
 *
 * Expands sources into per-file copy tasks and runs them on a pool of
 * workers. Workers report through a shared progress handle and turn
 * failures into corrective progress events.
 */

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Error thrown when the sources cannot be expanded into tasks
 */
export class CopyPlanError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CopyPlanError'
  }
}

/**
 * Error thrown when a single file fails to copy
 */
export class FileCopyError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly destination: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'FileCopyError'
  }
}

// ============================================================================
// Types
// ============================================================================

/**
 * One file to copy
 */
export interface CopyTask {
  source: string
  destination: string
  /** Size in bytes at planning time */
  size: number
}

/**
 * A file that could not be copied
 */
export interface CopyFailure {
  source: string
  destination: string
  error: string
}

/**
 * Outcome of a copy run
 */
export interface CopyResult {
  filesCopied: number
  bytesCopied: number
  failures: CopyFailure[]
  /** Wall time in milliseconds */
  duration: number
}

/**
 * The parts of the progress handle the copy engine uses
 */
export interface TransferProgress {
  extend(total: number): Promise<void>
  errorOnWrite(size: number): Promise<void>
  errorOnRead(size: number): Promise<void>
  setCaption(caption: Caption): Promise<void>
  newProxyReader(source: AsyncIterable<Uint8Array>): ProgressReader
}

export interface CopyOptions {
  /** Files copied in parallel */
  concurrency: number
  /** Extra attempts when the destination write fails */
  retries: number
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Expand sources into copy tasks
 *
 * - A directory is copied into `target/<name>/`, dot files included
 * - A single file is copied onto `target`, or into it when `target` is an
 *   existing directory
 * - Several sources are always copied into `target`
 *
 * @throws {CopyPlanError} If a source does not exist, or a destination is
 * its own source or lies inside it
 */
export async function planCopy(sources: string[], target: string): Promise<CopyTask[]> {
  const targetPath = path.resolve(target)
  const targetIsDir = await isDirectory(targetPath)
  const intoTarget = sources.length > 1 || targetIsDir
  const tasks: CopyTask[] = []

  for (const source of sources) {
    const sourcePath = path.resolve(source)
    const stats = await fs.stat(sourcePath).catch(() => null)
    if (!stats) {
      throw new CopyPlanError(`Source not found: ${source}`)
    }

    if (stats.isDirectory()) {
      const root = intoTarget ? path.join(targetPath, path.basename(sourcePath)) : targetPath
      if (isWithin(root, sourcePath)) {
        throw new CopyPlanError(`Cannot copy ${source} into itself`)
      }
      const files = await globby('**/*', {
        cwd: sourcePath,
        dot: true,
        onlyFiles: true,
        followSymbolicLinks: false,
      })

      for (const file of files.sort()) {
        const filePath = path.join(sourcePath, file)
        const fileStats = await fs.stat(filePath)
        tasks.push({
          source: filePath,
          destination: path.join(root, file),
          size: fileStats.size,
        })
      }
      continue
    }

    const destination = intoTarget ? path.join(targetPath, path.basename(sourcePath)) : targetPath
    if (destination === sourcePath) {
      throw new CopyPlanError(`Cannot copy ${source} onto itself`)
    }
    tasks.push({ source: sourcePath, destination, size: stats.size })
  }

  return tasks
}

/**
 * Whether `child` is `parent` or a path below it
 */
function isWithin(child: string, parent: string): boolean {
  const relative = path.relative(parent, child)
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory()
  } catch {
    return false
  }
}

// ============================================================================
// Copying
// ============================================================================

export class CopyHelper {
  constructor(
    private readonly bar: TransferProgress,
    private readonly options: CopyOptions
  ) {}

  /**
   * Copy every task, `concurrency` files at a time
   *
   * A failed file does not stop the others; it is reported in the result.
   */
  async copy(tasks: CopyTask[]): Promise<CopyResult> {
    const startTime = Date.now()
    const result: CopyResult = { filesCopied: 0, bytesCopied: 0, failures: [], duration: 0 }

    for (const task of tasks) {
      await this.bar.extend(task.size)
    }

    let next = 0
    const worker = async (): Promise<void> => {
      while (next < tasks.length) {
        const task = tasks[next++]
        if (!task) {
          return
        }

        try {
          result.bytesCopied += await this.copyFile(task)
          result.filesCopied++
        } catch (error) {
          result.failures.push({
            source: task.source,
            destination: task.destination,
            error: error instanceof Error ? error.message : String(error),
          })
        }
      }
    }

    const workerCount = Math.max(1, Math.min(this.options.concurrency, tasks.length))
    await Promise.all(Array.from({ length: workerCount }, () => worker()))

    result.duration = Date.now() - startTime
    return result
  }

  /**
   * Copy one file, retrying destination failures
   *
   * @returns Bytes written
   * @throws {FileCopyError} When the source fails or retries run out
   */
  async copyFile(task: CopyTask): Promise<number> {
    await this.bar.setCaption({ message: task.source, separator: path.sep })

    const destinationDir = path.dirname(task.destination)
    try {
      await fs.ensureDir(destinationDir)
    } catch (error) {
      // Nothing was read; the whole file is skipped
      await this.bar.errorOnRead(task.size)
      const cause = error instanceof Error ? error : undefined
      throw new FileCopyError(
        `Failed to create ${destinationDir}: ${cause ? cause.message : String(error)}`,
        task.source,
        task.destination,
        cause
      )
    }

    for (let attempt = 0; ; attempt++) {
      const reader = this.bar.newProxyReader(fs.createReadStream(task.source))

      try {
        await pipeline(reader, fs.createWriteStream(task.destination))
        return reader.bytesRead
      } catch (error) {
        const cause = error instanceof Error ? error : undefined
        const reason = cause ? cause.message : String(error)

        if (reader.readFailed) {
          // The rest of this source will never be read
          await this.bar.errorOnRead(task.size - reader.bytesRead)
          throw new FileCopyError(
            `Failed to read ${task.source}: ${reason}`,
            task.source,
            task.destination,
            cause
          )
        }

        // Bytes read so far never reached the destination
        await this.bar.errorOnWrite(reader.bytesRead)

        if (attempt >= this.options.retries) {
          await this.bar.errorOnRead(task.size)
          throw new FileCopyError(
            `Failed to write ${task.destination}: ${reason}`,
            task.source,
            task.destination,
            cause
          )
        }
      }
    }
  }
}

/**
 * Create a copy helper bound to a progress handle
 */
export function createCopyHelper(bar: TransferProgress, options: CopyOptions): CopyHelper {
  return new CopyHelper(bar, options)
}
