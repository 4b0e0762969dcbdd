/**
 * Core Package
 *
 * Logging and environment configuration shared by every package
 */

export * from './env'
export * from './logger'
