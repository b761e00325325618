import { Command, Flags } from '@oclif/core'
import { configLoader } from '../../config/loader.js'
import type { ConfigWithSource } from '../../config/schema.js'
import { jsonFlag } from '../../utils/common-flags.js'
import { ErrorHelper, toError } from '../../utils/errors.js'

/**
 * Show merged configuration
 *
 * Displays the final configuration after merging all sources.
 */
export default class ConfigShow extends Command {
  static description = 'Display merged configuration from all sources'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --sources',
    '<%= config.bin %> <%= command.id %> --json',
  ]

  static flags = {
    sources: Flags.boolean({
      char: 's',
      description: 'Show where each setting comes from',
      default: false,
    }),

    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ConfigShow)
    await this.execute({ sources: flags.sources, json: flags.json })
  }

  /**
   * Load and print the configuration
   */
  async execute(options: { sources: boolean; json: boolean; cwd?: string }): Promise<void> {
    let configWithSources: ConfigWithSource
    try {
      configWithSources = await configLoader.loadWithSources({
        cwd: options.cwd,
        onWarning: (message) => ErrorHelper.warn(this, message, options.json),
      })
    } catch (error) {
      ErrorHelper.operation(this, toError(error), 'Failed to load configuration', options.json)
    }

    if (options.json) {
      this.log(
        JSON.stringify(options.sources ? configWithSources : configWithSources.config, null, 2)
      )
      return
    }

    await this.displayHumanReadable(configWithSources, options.sources)
  }

  /**
   * Display configuration in TOML-like sections
   */
  private async displayHumanReadable(
    configWithSources: ConfigWithSource,
    showSources: boolean
  ): Promise<void> {
    const chalk = (await import('chalk')).default
    const { config, sources } = configWithSources

    for (const [section, values] of Object.entries(config)) {
      this.log(chalk.cyan.bold(`[${section}]`))
      for (const [key, value] of Object.entries(values)) {
        const source = sources[`${section}.${key}`] ?? 'default'
        this.log(
          `  ${key} = ${chalk.yellow(JSON.stringify(value))}${
            showSources ? chalk.gray(` (${this.formatSource(source)})`) : ''
          }`
        )
      }
      this.log('')
    }
  }

  /**
   * Format source name for display
   */
  private formatSource(source: string): string {
    const sourceMap: Record<string, string> = {
      ferry_toml: '.ferry.toml',
      package_json: 'package.json',
      global_config: '~/.config/ferry/config.toml',
      default: 'default',
      cli_flag: 'CLI flag',
      env_vars: 'environment variable',
    }
    return sourceMap[source] || source
  }
}
