import { parse as parseToml } from '@iarna/toml'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { z } from 'zod'
import type { ConfigFile, ConfigWithSource, FerryConfig, PartialFerryConfig } from './schema.js'
import {
  ConfigSource,
  DEFAULT_CONFIG,
  PartialFerryConfigSchema,
  validateConfig,
  validatePartialConfig,
} from './schema.js'
import { getEnvConfig, hasEnvConfig } from './env.js'

/**
 * Configuration Loader
 *
 * Discovers and loads Ferry configuration from multiple sources:
 * 1. .ferry.toml (current directory, then parents up to the stop directory)
 * 2. package.json "ferry" key
 * 3. Global config (~/.config/ferry/config.toml)
 *
 * Environment variables and CLI flags are layered on top.
 */

// ============================================================================
// Configuration File Patterns
// ============================================================================

const CONFIG_FILES = {
  FERRY_TOML: '.ferry.toml',
  PACKAGE_JSON: 'package.json',
} as const

/**
 * Priority order for configuration sources (higher = more priority)
 */
const SOURCE_PRIORITY: Record<ConfigSource, number> = {
  [ConfigSource.CLI_FLAG]: 100,
  [ConfigSource.ENV_VARS]: 90,
  [ConfigSource.FERRY_TOML]: 80,
  [ConfigSource.PACKAGE_JSON]: 70,
  [ConfigSource.GLOBAL_CONFIG]: 50,
  [ConfigSource.DEFAULT]: 0,
}

/**
 * A parsed configuration layer
 */
export interface ConfigLayer {
  config: PartialFerryConfig
  source: ConfigSource
}

export interface LoadOptions {
  /** Directory the search starts from (defaults to process.cwd()) */
  cwd?: string
  /** Highest directory searched for project files (defaults to getDefaultStopDir(cwd)) */
  stopDir?: string
  /** Values given on the command line */
  overrides?: PartialFerryConfig
  skipCache?: boolean
  /** Receives a message for every config file that fails to parse */
  onWarning?: (message: string) => void
}

// ============================================================================
// Configuration Discovery
// ============================================================================

/**
 * Discover configuration files from the start directory up to the stop directory
 *
 * Files are returned farthest first so that, within one source type,
 * the file nearest to the start directory is merged last and wins.
 */
export async function discoverConfigFiles(
  startDir: string,
  stopDir: string = startDir
): Promise<ConfigFile[]> {
  const directories: string[] = []
  let currentDir = path.resolve(startDir)
  const resolvedStopDir = path.resolve(stopDir)

  while (true) {
    directories.push(currentDir)

    if (currentDir === resolvedStopDir) {
      break
    }

    const parentDir = path.dirname(currentDir)
    // Stop if we've reached filesystem root
    if (parentDir === currentDir) {
      break
    }
    currentDir = parentDir
  }

  const configFiles: ConfigFile[] = []

  const globalConfigPath = getGlobalConfigPath()
  configFiles.push({
    path: globalConfigPath,
    source: ConfigSource.GLOBAL_CONFIG,
    priority: SOURCE_PRIORITY[ConfigSource.GLOBAL_CONFIG],
    exists: await configFileExists(globalConfigPath),
  })

  for (const dir of directories.reverse()) {
    for (const [fileName, source] of [
      [CONFIG_FILES.PACKAGE_JSON, ConfigSource.PACKAGE_JSON],
      [CONFIG_FILES.FERRY_TOML, ConfigSource.FERRY_TOML],
    ] as const) {
      const filePath = path.join(dir, fileName)
      configFiles.push({
        path: filePath,
        source,
        priority: SOURCE_PRIORITY[source],
        exists: await configFileExists(filePath),
      })
    }
  }

  return configFiles
}

/**
 * Get global configuration file path
 *
 * @returns Path to global config file (~/.config/ferry/config.toml)
 */
export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), '.config', 'ferry', 'config.toml')
}

/**
 * Highest directory searched for project files
 *
 * The home directory when `cwd` is inside it, otherwise the filesystem root.
 */
export function getDefaultStopDir(cwd: string): string {
  const resolved = path.resolve(cwd)
  const home = os.homedir()
  const relative = path.relative(home, resolved)
  if (relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))) {
    return home
  }
  return path.parse(resolved).root
}

/**
 * Check if a configuration file exists and is readable
 */
export async function configFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.R_OK)
    return true
  } catch {
    return false
  }
}

// ============================================================================
// Configuration Parsers
// ============================================================================

/**
 * Parse a .ferry.toml (or global config.toml) file
 */
export async function parseFerryToml(filePath: string): Promise<PartialFerryConfig> {
  const contents = await fs.readFile(filePath, 'utf-8')
  return validatePartialConfig(parseToml(contents))
}

const PackageJsonSchema = z.object({
  ferry: PartialFerryConfigSchema.optional(),
})

/**
 * Parse package.json file
 *
 * Extracts the "ferry" key
 */
export async function parsePackageJson(filePath: string): Promise<PartialFerryConfig> {
  const contents = await fs.readFile(filePath, 'utf-8')
  const parsed: unknown = JSON.parse(contents)
  return PackageJsonSchema.parse(parsed).ferry ?? {}
}

/**
 * Parse configuration file based on its type
 */
export async function parseConfigFile(configFile: ConfigFile): Promise<PartialFerryConfig> {
  switch (configFile.source) {
    case ConfigSource.FERRY_TOML:
    case ConfigSource.GLOBAL_CONFIG:
      return parseFerryToml(configFile.path)
    case ConfigSource.PACKAGE_JSON:
      return parsePackageJson(configFile.path)
    default:
      return {}
  }
}

// ============================================================================
// Configuration Merging
// ============================================================================

/**
 * Deep merge two configuration objects
 *
 * Values from `override` replace values from `base`, key by key. A key that
 * is present but undefined in `override` also replaces, so callers leave
 * unset keys out.
 */
export function mergeConfigs(
  base: PartialFerryConfig,
  override: PartialFerryConfig
): PartialFerryConfig {
  return {
    progress: { ...base.progress, ...override.progress },
    copy: { ...base.copy, ...override.copy },
  }
}

/**
 * Merge multiple configuration sources
 *
 * Layers are merged in priority order (lower priority first) on top of
 * DEFAULT_CONFIG. Layers of equal priority keep their given order.
 */
export function mergeMultipleConfigs(layers: ConfigLayer[]): ConfigWithSource {
  const sortedLayers = [...layers].sort(
    (a, b) => SOURCE_PRIORITY[a.source] - SOURCE_PRIORITY[b.source]
  )

  let mergedConfig: PartialFerryConfig = {
    progress: { ...DEFAULT_CONFIG.progress },
    copy: { ...DEFAULT_CONFIG.copy },
  }
  const sources: { [key: string]: ConfigSource } = {}

  for (const [section, values] of Object.entries(DEFAULT_CONFIG)) {
    sources[section] = ConfigSource.DEFAULT
    for (const key of Object.keys(values)) {
      sources[`${section}.${key}`] = ConfigSource.DEFAULT
    }
  }

  for (const { config, source } of sortedLayers) {
    mergedConfig = mergeConfigs(mergedConfig, config)

    for (const [section, values] of Object.entries(config)) {
      if (values === undefined) {
        continue
      }
      sources[section] = source
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) {
          sources[`${section}.${key}`] = source
        }
      }
    }
  }

  return {
    config: validateConfig(mergedConfig),
    sources,
  }
}

// ============================================================================
// Configuration Loading (Main API)
// ============================================================================

/**
 * Configuration loader with caching
 */
export class ConfigLoader {
  private cache: Map<string, FerryConfig> = new Map()

  /**
   * Load configuration from all sources
   */
  async load(options: LoadOptions = {}): Promise<FerryConfig> {
    const cwd = options.cwd || process.cwd()
    const stopDir = options.stopDir || getDefaultStopDir(cwd)

    // CLI overrides differ per call, so only file and env layers are cached
    const cacheKey = `${cwd}:${stopDir}`
    const cached = options.skipCache ? undefined : this.cache.get(cacheKey)
    if (cached && !options.overrides) {
      return cached
    }

    const { config } = await this.loadWithSources({ ...options, cwd, stopDir })
    if (!options.overrides) {
      this.cache.set(cacheKey, config)
    }
    return config
  }

  /**
   * Load configuration with source tracking
   *
   * Useful for debugging to see where each setting comes from.
   */
  async loadWithSources(options: LoadOptions = {}): Promise<ConfigWithSource> {
    const cwd = options.cwd || process.cwd()
    const stopDir = options.stopDir || getDefaultStopDir(cwd)
    const layers: ConfigLayer[] = []

    for (const configFile of await discoverConfigFiles(cwd, stopDir)) {
      if (!configFile.exists) {
        continue
      }

      try {
        layers.push({ config: await parseConfigFile(configFile), source: configFile.source })
      } catch (error) {
        // Keep going with the other files
        const reason = error instanceof Error ? error.message : String(error)
        const warn = options.onWarning ?? ((message: string) => console.warn(message))
        warn(`Failed to parse ${configFile.path}: ${reason}`)
      }
    }

    if (hasEnvConfig()) {
      layers.push({ config: getEnvConfig(), source: ConfigSource.ENV_VARS })
    }

    if (options.overrides) {
      layers.push({ config: options.overrides, source: ConfigSource.CLI_FLAG })
    }

    return mergeMultipleConfigs(layers)
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear()
  }
}

/**
 * Default config loader instance
 */
export const configLoader = new ConfigLoader()
