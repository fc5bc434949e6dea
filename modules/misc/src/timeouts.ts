/**
 * Represents an event that should happen at some point in the future.
 */
export class Timeout {
  constructor(private readonly promise: Promise<void>) {}

  /**
   * Returns a promise that is resolved when the timeout expires (or, if the timeout was created with an abort signal,
   * when that signal fires, whichever comes first).
   */
  hasPassed(): Promise<void> {
    return this.promise
  }
}

export function aTimeoutOf(ms: number, signal?: AbortSignal): Timeout {
  return new Timeout(
    new Promise<void>(resolve => {
      if (signal?.aborted) {
        resolve()
        return
      }
      const onAbort = () => {
        clearTimeout(handle)
        resolve()
      }
      const handle = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, Math.max(0, ms))
      signal?.addEventListener('abort', onAbort, { once: true })
    }),
  )
}

export type Raced<T> = { settled: true; value: T } | { settled: false }

/**
 * Waits for `promise` for at most `ms` milliseconds. The promise is not cancelled when the time runs out: it keeps
 * running and its eventual rejection, if any, is handed to `onLateRejection`.
 */
export async function raceWithTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onLateRejection: (e: unknown) => void,
): Promise<Raced<T>> {
  let handle: NodeJS.Timeout | undefined
  let timedOut = false
  const timer = new Promise<Raced<T>>(resolve => {
    handle = setTimeout(() => {
      timedOut = true
      resolve({ settled: false })
    }, ms)
  })

  const guarded = promise.then(
    (value): Raced<T> => ({ settled: true, value }),
    (e: unknown): Raced<T> => {
      if (timedOut) {
        onLateRejection(e)
        return { settled: false }
      }
      throw e
    },
  )

  try {
    return await Promise.race([guarded, timer])
  } finally {
    clearTimeout(handle)
  }
}
