/**
 * Centralized Type Definitions
 *
 * Shared types for the interpreter packages: the instruction stream, the
 * I/O boundary, run results and the Safe error-handling tuples.
 */

export * from './errors'
export * from './safe'
export * from './vm'
