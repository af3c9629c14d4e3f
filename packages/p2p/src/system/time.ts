import { raceSignal } from 'race-signal'
import { setTimeout as delay } from 'node:timers/promises'

/**
 * Sleeps `ms`, rejecting as soon as `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal })
}

/**
 * Resolves with `promise` unless `ms` elapses or `signal` aborts first. A
 * timeout rejects with `onTimeout()`, an abort with the race's abort error.
 * `promise` itself keeps running either way.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal,
): Promise<T> {
  const timeout = AbortSignal.timeout(ms)
  const combined = signal === undefined ? timeout : AbortSignal.any([signal, timeout])
  try {
    return await raceSignal(promise, combined)
  } catch (err) {
    if (timeout.aborted && signal?.aborted !== true) throw onTimeout()
    throw err
  }
}
