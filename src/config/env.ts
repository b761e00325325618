import type { PartialFerryConfig } from './schema.js'
import { validatePartialConfig } from './schema.js'

/**
 * Environment Variable Parser
 *
 * Parses FERRY_* environment variables and converts them to configuration.
 *
 * Mapping rules:
 * - FERRY_COPY_CONCURRENCY=8 → copy.concurrency = 8
 * - FERRY_PROGRESS_SHOW_SPEED=no → progress.showSpeed = false
 * - FERRY_PROGRESS_STYLE='[#> ]' → progress.style = '[#> ]'
 *
 * Supports:
 * - Boolean values: true/false, 1/0, yes/no
 * - Integer values
 * - Nested properties: FERRY_SECTION_KEY
 */

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'FERRY_'

type EnvValueType = 'string' | 'boolean' | 'number'

/**
 * Supported environment variables, their config paths and value types
 */
const ENV_VAR_MAP: Record<string, { path: string; type: EnvValueType }> = {
  // Progress bar settings
  FERRY_PROGRESS_REFRESH_RATE: { path: 'progress.refreshRate', type: 'number' },
  FERRY_PROGRESS_STYLE: { path: 'progress.style', type: 'string' },
  FERRY_PROGRESS_SHOW_SPEED: { path: 'progress.showSpeed', type: 'boolean' },

  // Copy settings
  FERRY_COPY_CONCURRENCY: { path: 'copy.concurrency', type: 'number' },
  FERRY_COPY_RETRIES: { path: 'copy.retries', type: 'number' },
}

/**
 * Parse a boolean value from string
 *
 * Supports: true/false, 1/0, yes/no (case insensitive)
 */
export function parseBoolean(value: string): boolean {
  const lower = value.toLowerCase().trim()
  return ['true', '1', 'yes'].includes(lower)
}

/**
 * Parse an integer value from string
 *
 * @returns The integer, or NaN when the string is not one
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim()
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Set a nested property on an object using dot notation
 *
 * @example
 * setNestedProperty({}, 'copy.retries', 2) // { copy: { retries: 2 } }
 */
export function setNestedProperty(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): void {
  const keys = path.split('.')
  const lastKey = keys.pop()
  if (lastKey === undefined) {
    return
  }

  let current = obj
  for (const key of keys) {
    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  current[lastKey] = value
}

/**
 * Parse a single environment variable value according to its declared type
 */
export function parseEnvValue(key: string, value: string): unknown {
  switch (ENV_VAR_MAP[key]?.type) {
    case 'number':
      return parseInteger(value)
    case 'boolean':
      return parseBoolean(value)
    default:
      return value
  }
}

/**
 * Parse all FERRY_* environment variables
 *
 * @param env - Environment variables object (defaults to process.env)
 * @returns Partial configuration from environment variables
 * @throws {z.ZodError} If a variable holds a value the schema rejects
 */
export function parseEnvVars(env: NodeJS.ProcessEnv = process.env): PartialFerryConfig {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || !value) {
      continue
    }

    const mapping = ENV_VAR_MAP[key]
    if (mapping) {
      setNestedProperty(config, mapping.path, parseEnvValue(key, value))
    }
  }

  return validatePartialConfig(config)
}

/**
 * Get configuration from environment variables
 */
export function getEnvConfig(): PartialFerryConfig {
  return parseEnvVars()
}

/**
 * Check if any FERRY_* environment variables are set
 */
export function hasEnvConfig(env: NodeJS.ProcessEnv = process.env): boolean {
  return Object.keys(env).some((key) => key.startsWith(ENV_PREFIX))
}
