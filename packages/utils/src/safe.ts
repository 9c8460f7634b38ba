import * as _ from 'radash'

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Runs a throwing function and returns its outcome as a tuple.
 */
export function safeSyncTry<T>(callBack: () => T) {
  return _.try(callBack)()
}
