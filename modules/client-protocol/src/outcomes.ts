import { ClientFunction, Invocation, Key, Outcome, RegisterValue } from 'core-types'
import { errorLike, shouldNeverHappen } from 'misc'

import { fail, info, InvokeResult } from './client'

export const TIMEOUT_ERROR = 'timeout'

/**
 * A read that did not complete in time could not have changed anything, so it is a `fail`. A write or a cas could have
 * taken effect, so it is `info`.
 */
export function timeoutOutcome(f: ClientFunction): InvokeResult {
  return f === 'read' ? fail(TIMEOUT_ERROR) : info(TIMEOUT_ERROR)
}

/**
 * The outcome of an invocation whose client threw instead of returning an outcome: treated like a transport error.
 */
export function thrownOutcome(f: ClientFunction, e: unknown): InvokeResult {
  const message = errorLike(e).message ?? String(e)
  return f === 'read' ? fail(message) : info(message)
}

/**
 * The content of the operation that records a completed invocation.
 */
export type Completion =
  | { f: 'read'; key: Key; value: RegisterValue; outcome: Outcome; error?: string }
  | { f: 'write'; key: Key; value: number; outcome: Outcome; error?: string }
  | { f: 'cas'; key: Key; value: [number, number]; outcome: Outcome; error?: string }

export function completionOf(invocation: Invocation, result: InvokeResult): Completion {
  const error = result.outcome === 'ok' ? undefined : result.error
  const common = error === undefined ? { outcome: result.outcome } : { outcome: result.outcome, error }
  if (invocation.f === 'read') {
    const value = result.outcome === 'ok' ? result.value ?? null : null
    return { ...common, f: 'read', key: invocation.key, value }
  }
  if (invocation.f === 'write') {
    return { ...common, f: 'write', key: invocation.key, value: invocation.value }
  }
  if (invocation.f === 'cas') {
    return { ...common, f: 'cas', key: invocation.key, value: invocation.value }
  }
  shouldNeverHappen(invocation)
}
