import * as _ from 'radash'

/**
 * Error-first result tuples for work that can fail before a run starts:
 * reading a program file, validating a listing, building a program.
 * Faults during a run use `Faultable` instead.
 */

export type SafeResult<T> = [error: undefined, value: T]
export type SafeError<E extends Error> = [error: E, value: undefined]

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>
export type SafePromise<T, E extends Error = Error> = Promise<Safe<T, E>>

export function safeResult<T>(value: T): SafeResult<T> {
  return [undefined, value]
}

export function safeError<E extends Error>(error: E): SafeError<E> {
  return [error, undefined]
}

/**
 * Run an async task, capturing a thrown error or rejection as a Safe error
 */
export function safeTry<T>(task: () => Promise<T>): SafePromise<T> {
  return _.try(task)()
}
