/**
 * Environment configuration
 */

import { z } from 'zod'
import { ConfigError } from '../errors'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Environment variables read by the library.
 * Priority: explicit argument > process.env > defaults below.
 */
export const envSchema = z.object({
  TRANSIT_MODEL_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  TRANSIT_MODEL_LOG: z.enum(['0', '1']).default('1'),
})

export interface TransitModelConfig {
  logLevel: LogLevel
  logEnabled: boolean
}

export const defaultConfig: TransitModelConfig = {
  logLevel: 'info',
  logEnabled: true,
}

function toConfig(env: z.infer<typeof envSchema>): TransitModelConfig {
  return {
    logLevel: env.TRANSIT_MODEL_LOG_LEVEL,
    logEnabled: env.TRANSIT_MODEL_LOG === '1',
  }
}

/**
 * Resolve configuration from environment variables.
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TransitModelConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issue = result.error.errors[0]
    const variable = issue?.path.join('.')
    throw new ConfigError(
      `Invalid configuration for ${variable ?? 'environment'}: ${issue?.message ?? 'validation failed'}`,
      variable,
    )
  }
  return toConfig(result.data)
}

/**
 * Same as `loadConfig`, but falls back to defaults instead of throwing.
 * Returns the error alongside so the caller can report it.
 */
export function loadConfigOrDefault(env: NodeJS.ProcessEnv = process.env): {
  config: TransitModelConfig
  error?: ConfigError
} {
  try {
    return { config: loadConfig(env) }
  } catch (error) {
    if (error instanceof ConfigError) {
      return { config: defaultConfig, error }
    }
    throw error
  }
}
