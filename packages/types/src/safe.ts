/**
 * Set of tuple types and constructors for returning errors as values
 * instead of throwing them
 */

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeErrorStr<T extends string>(err: T): SafeError<T> {
  return [err, undefined]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

export function isSafeError<T, E extends Error | string>(
  safe: Safe<T, E>,
): safe is SafeError<E> {
  return safe[0] !== undefined
}
