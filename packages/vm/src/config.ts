/**
 * VM Configuration Constants
 *
 * Centralized configuration for the interpreter runtime
 */

import {
  createEnvSchema,
  type LoadEnvOptions,
  loadEnvVariables,
  zBoolean,
} from '@cursevm/core'
import type { NumericBackend } from '@cursevm/types'
import { z } from 'zod'

// Unicode scalar value range accepted by OUTPUT_CHAR
export const CODEPOINT_LIMITS = {
  MAX: 0x10ffff,
  SURROGATE_MIN: 0xd800,
  SURROGATE_MAX: 0xdfff,
} as const

// Stack indices start at 1; index 0 is reserved
export const FIRST_STACK_INDEX = 1

export const NUMERIC_BACKENDS = [
  'bounded',
  'arbitrary',
] as const satisfies readonly NumericBackend[]

export const vmEnvSchema = createEnvSchema({
  CURSEVM_NUMERIC_BACKEND: z.enum(NUMERIC_BACKENDS).default('arbitrary'),
  CURSEVM_TRACE: zBoolean({ defaultValue: false }),
})

export interface VmConfig {
  numericBackend: NumericBackend
  trace: boolean
}

export const DEFAULT_VM_CONFIG: VmConfig = {
  numericBackend: 'arbitrary',
  trace: false,
}

/**
 * Load the interpreter configuration from the environment (and .env)
 */
export function loadVmConfig(options: LoadEnvOptions = {}): VmConfig {
  const env = loadEnvVariables(vmEnvSchema, options)
  return {
    numericBackend: env.CURSEVM_NUMERIC_BACKEND,
    trace: env.CURSEVM_TRACE,
  }
}

export function isScalarValue(codepoint: bigint): boolean {
  return (
    codepoint >= 0n &&
    codepoint <= BigInt(CODEPOINT_LIMITS.MAX) &&
    (codepoint < BigInt(CODEPOINT_LIMITS.SURROGATE_MIN) ||
      codepoint > BigInt(CODEPOINT_LIMITS.SURROGATE_MAX))
  )
}
