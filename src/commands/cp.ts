import { Args, Command } from '@oclif/core'
import { configLoader } from '../config/loader.js'
import type { CopyConfig, FerryConfig } from '../config/schema.js'
import { formatBytes } from '../progress/byteBar.js'
import { createConsoleSink } from '../progress/console.js'
import { newCopyBar } from '../progress/copyBar.js'
import type { CopyBar } from '../progress/copyBar.js'
import { concurrencyFlag, jsonFlag, retriesFlag } from '../utils/common-flags.js'
import { createCopyHelper, planCopy } from '../utils/copy.js'
import type { CopyResult, CopyTask } from '../utils/copy.js'
import { ErrorHelper, toError } from '../utils/errors.js'

type Spinner = Awaited<ReturnType<typeof import('ora').default>>
type Chalk = Awaited<typeof import('chalk').default>

/**
 * Parsed input for a copy run
 */
export interface CopyInput {
  /** Sources followed by the target */
  paths: string[]
  json: boolean
  concurrency?: number
  retries?: number
  /** Directory the config search starts from (defaults to process.cwd()) */
  cwd?: string
}

/**
 * Copy files and directories
 *
 * Files are copied by a pool of workers that share one progress bar. The
 * bar shows the current file above a byte count, speed and ETA line.
 */
export default class CopyCommand extends Command {
  static description = 'Copy files and directories with a progress bar'

  static examples = [
    '<%= config.bin %> <%= command.id %> ./photos /mnt/backup',
    '<%= config.bin %> <%= command.id %> a.iso b.iso /mnt/usb --concurrency 2',
    '<%= config.bin %> <%= command.id %> ./build ./release --retries 3 --json',
  ]

  // Variadic: any number of sources, then the target
  static strict = false

  static args = {
    paths: Args.string({
      description: 'One or more sources followed by the target',
      required: true,
    }),
  }

  static flags = {
    concurrency: concurrencyFlag,
    retries: retriesFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(CopyCommand)

    await this.execute({
      paths: argv.filter((arg): arg is string => typeof arg === 'string'),
      json: flags.json,
      concurrency: flags.concurrency,
      retries: flags.retries,
    })
  }

  /**
   * Run a copy from already parsed input
   */
  async execute(input: CopyInput): Promise<CopyResult> {
    const { json } = input
    const sources = [...input.paths]
    const target = sources.pop()

    if (target === undefined || sources.length === 0) {
      ErrorHelper.validation(
        this,
        'Provide at least one source and a target.\nUsage: ferry cp SOURCE... TARGET',
        json
      )
    }

    const { spinner, chalk } = await this.initializeUI(json)

    // JSON output stays a single document; warnings go into the summary
    const warnings: string[] = []
    const warn = (message: string): void => {
      if (json) {
        warnings.push(message)
      } else {
        ErrorHelper.warn(this, message)
      }
    }

    // 1. Resolve configuration (flags override files and environment)
    let config: FerryConfig
    try {
      config = await this.loadConfig(input, warn)
    } catch (error) {
      ErrorHelper.operation(this, toError(error), 'Failed to load configuration', json)
    }

    // 2. Expand sources into per-file tasks
    let tasks: CopyTask[]
    spinner?.start('Scanning sources...')
    try {
      tasks = await planCopy(sources, target)
    } catch (error) {
      spinner?.fail('Scan failed')
      ErrorHelper.operation(this, toError(error), 'Failed to scan sources', json)
    }

    if (tasks.length === 0) {
      spinner?.stop()
      warn('Nothing to copy')
    } else {
      spinner?.succeed(`Found ${tasks.length} file(s)`)
    }

    // 3. Copy with a shared progress bar, always shutting it down
    const bar = this.createBar(config, json)
    let result: CopyResult
    try {
      result = await createCopyHelper(bar, config.copy).copy(tasks)
    } finally {
      await bar.finish()
    }

    // 4. Report
    this.report(result, tasks.length, { json, chalk, warnings })
    return result
  }

  /**
   * Initialize UI components (spinner and chalk)
   */
  private async initializeUI(isJson: boolean): Promise<{
    spinner: Spinner | null
    chalk: Chalk | null
  }> {
    const ora = !isJson ? (await import('ora')).default : null
    const spinner = ora ? ora() : null
    const chalk = !isJson ? (await import('chalk')).default : null

    return { spinner, chalk }
  }

  private async loadConfig(
    input: CopyInput,
    onWarning: (message: string) => void
  ): Promise<FerryConfig> {
    const copy: Partial<CopyConfig> = {}
    if (input.concurrency !== undefined) {
      copy.concurrency = input.concurrency
    }
    if (input.retries !== undefined) {
      copy.retries = input.retries
    }

    return configLoader.load({ cwd: input.cwd, overrides: { copy }, onWarning })
  }

  private createBar(config: FerryConfig, json: boolean): CopyBar {
    return newCopyBar({
      sink: createConsoleSink({ silent: json }),
      refreshRate: config.progress.refreshRate,
      style: config.progress.style,
      showSpeed: config.progress.showSpeed,
    })
  }

  private report(
    result: CopyResult,
    total: number,
    output: { json: boolean; chalk: Chalk | null; warnings: string[] }
  ): void {
    const { json, chalk, warnings } = output
    const failed = result.failures.length

    if (json) {
      this.log(
        JSON.stringify(
          {
            status: failed > 0 ? 'partial' : 'success',
            filesCopied: result.filesCopied,
            bytesCopied: result.bytesCopied,
            duration: result.duration,
            failures: result.failures,
            warnings,
          },
          null,
          2
        )
      )
      if (failed > 0) {
        this.exit(1)
      }
      return
    }

    // Move off the progress bar line
    this.log('')

    const seconds = (result.duration / 1000).toFixed(1)
    const summary = `Copied ${result.filesCopied} file(s), ${formatBytes(result.bytesCopied)} in ${seconds}s`
    this.log(chalk ? chalk.green(`✓ ${summary}`) : `✓ ${summary}`)

    if (failed > 0) {
      for (const failure of result.failures) {
        ErrorHelper.warn(this, `${failure.source}: ${failure.error}`)
      }
      ErrorHelper.operation(
        this,
        new Error(`${failed} of ${total} file(s) failed`),
        'Copy incomplete'
      )
    }
  }
}
