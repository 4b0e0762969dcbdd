import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

/**
 * coerce.boolean doesnt work by default: https://github.com/colinhacks/zod/discussions/3329
 */
export const zBoolean = ({ defaultValue }: { defaultValue: boolean }) => {
  return z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((x) => x === 'true' || x === '1')
}

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

export interface LoadEnvOptions {
  /** Optional path to a .env file */
  envPath?: string
  /** Variables to validate; process.env when omitted */
  source?: Record<string, string | undefined>
}

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  options: LoadEnvOptions = {},
): z.infer<T> {
  if (options.source) {
    return schema.parse(options.source)
  }

  // Load environment variables from .env file
  dotenvConfig({ path: options.envPath })

  return schema.parse(process.env)
}

/**
 * Load base environment variables
 */
export function loadBaseEnv(options: LoadEnvOptions = {}): BaseEnv {
  return loadEnvVariables(baseEnvSchema, options)
}

/**
 * Create a complete environment schema by extending the base schema
 * @param additionalSchema - Additional schema to extend the base schema with
 * @returns Combined schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
