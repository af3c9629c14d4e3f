import * as _ from 'radash'

export type SafePromise<T, E extends Error = Error> = Promise<Safe<T, E>>

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Runs `fn` and returns `[err, undefined]` or `[undefined, value]` instead of
 * throwing. Non-Error throwables are wrapped so callers can always log
 * `err.message`.
 */
export async function safeTry<T>(fn: () => Promise<T>): SafePromise<T> {
  const [err, res] = await _.try(fn)()
  if (err !== undefined) return safeError(toError(err))
  return safeResult(res)
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
