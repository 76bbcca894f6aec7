/**
 * Result tuples used instead of throwing across package boundaries.
 *
 * A fallible operation returns `[error, undefined]` or `[undefined, value]`;
 * callers destructure and branch on the error slot.
 */

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
