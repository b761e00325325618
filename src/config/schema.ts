import { z } from 'zod'

/**
 * Configuration Schema for Ferry
 *
 * Defines TypeScript interfaces and Zod schemas for validating
 * configuration from multiple sources (.ferry.toml, package.json,
 * global config, environment variables, CLI flags)
 */

// ============================================================================
// Zod Schemas (for validation)
// ============================================================================

/**
 * Progress bar configuration schema
 */
export const ProgressConfigSchema = z.object({
  refreshRate: z.number().int().positive().default(100),
  style: z.string().length(5).default('[=> ]'),
  showSpeed: z.boolean().default(true),
})

/**
 * Progress bar configuration schema without defaults (for partial config validation)
 */
export const ProgressConfigSchemaPartial = z.object({
  refreshRate: z.number().int().positive().optional(),
  style: z.string().length(5).optional(),
  showSpeed: z.boolean().optional(),
})

/**
 * Copy configuration schema
 */
export const CopyConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
  retries: z.number().int().min(0).default(0),
})

/**
 * Copy configuration schema without defaults (for partial config validation)
 */
export const CopyConfigSchemaPartial = z.object({
  concurrency: z.number().int().min(1).max(64).optional(),
  retries: z.number().int().min(0).optional(),
})

/**
 * Complete Ferry configuration schema
 */
export const FerryConfigSchema = z.object({
  progress: ProgressConfigSchema.default({}),
  copy: CopyConfigSchema.default({}),
})

/**
 * Partial Ferry configuration schema without defaults
 */
export const PartialFerryConfigSchema = z.object({
  progress: ProgressConfigSchemaPartial.optional(),
  copy: CopyConfigSchemaPartial.optional(),
})

// ============================================================================
// TypeScript Interfaces
// ============================================================================

/**
 * Progress bar options
 */
export interface ProgressConfig {
  /**
   * Minimum interval between redraws, in milliseconds
   * @default 100
   */
  refreshRate: number

  /**
   * Bar style: box start, fill, head, empty, box end
   * @default '[=> ]'
   */
  style: string

  /**
   * Show transfer speed next to the bar
   * @default true
   */
  showSpeed: boolean
}

/**
 * Copy options
 */
export interface CopyConfig {
  /**
   * Number of files copied in parallel
   * @default 4
   */
  concurrency: number

  /**
   * Extra attempts for a file whose destination write fails
   * @default 0
   */
  retries: number
}

/**
 * Complete Ferry configuration
 */
export interface FerryConfig {
  progress: ProgressConfig
  copy: CopyConfig
}

/**
 * Partial configuration (used for merging)
 */
export type PartialFerryConfig = {
  progress?: Partial<ProgressConfig>
  copy?: Partial<CopyConfig>
}

// ============================================================================
// Configuration Source Types
// ============================================================================

/**
 * Where a configuration value came from
 */
export enum ConfigSource {
  CLI_FLAG = 'cli_flag',
  ENV_VARS = 'env_vars',
  FERRY_TOML = 'ferry_toml',
  PACKAGE_JSON = 'package_json',
  GLOBAL_CONFIG = 'global_config',
  DEFAULT = 'default',
}

/**
 * Configuration with source tracking
 * Used for debugging and showing where settings come from
 */
export interface ConfigWithSource {
  config: FerryConfig
  sources: {
    [key: string]: ConfigSource
  }
}

/**
 * A discovered configuration file
 */
export interface ConfigFile {
  path: string
  source: ConfigSource
  priority: number
  exists: boolean
}

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 *
 * Used when no configuration files are found
 */
export const DEFAULT_CONFIG: FerryConfig = {
  progress: {
    refreshRate: 100,
    style: '[=> ]',
    showSpeed: true,
  },
  copy: {
    concurrency: 4,
    retries: 0,
  },
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration against schema
 *
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): FerryConfig {
  return FerryConfigSchema.parse(config)
}

/**
 * Validate partial configuration (for merging)
 */
export function validatePartialConfig(config: unknown): PartialFerryConfig {
  return PartialFerryConfigSchema.parse(config)
}
