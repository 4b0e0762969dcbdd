/**
 * @cursevm/vm
 *
 * Stack bank, queue, curse counter, instruction handlers and the run loop.
 */

export * from './assembler'
export * from './config'
export * from './curse-counter'
export * from './dispatcher'
export * from './instructions/arithmetic'
export * from './instructions/base'
export * from './instructions/control-flow'
export * from './instructions/io'
export * from './instructions/queue'
export * from './instructions/registry'
export * from './instructions/stack'
export * from './interpreter'
export * from './io/buffer-io'
export * from './io/stream-io'
export * from './io/whitespace'
export * from './machine-state'
export * from './program'
export * from './queue'
export * from './stack-bank'
