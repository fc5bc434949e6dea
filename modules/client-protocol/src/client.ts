import { Invocation, RegisterValue } from 'core-types'

/**
 * What a client reports back for a single invocation. Outcomes are values: a client never signals an operation-level
 * failure by throwing.
 *
 * - `ok`: the operation took effect. For a read, `value` is what was read (`null` if the register was never written).
 * - `fail`: the operation provably did not take effect.
 * - `info`: the effect of the operation is unknown.
 */
export type InvokeResult =
  | { outcome: 'ok'; value?: RegisterValue }
  | { outcome: 'fail'; error?: string }
  | { outcome: 'info'; error?: string }

/**
 * Talks to a single node of the system under test on behalf of a single worker. Lifecycle:
 *
 *    open(node) -> setup() -> invoke()* -> teardown() -> close()
 *
 * `open()` and `setup()` may throw (the run is then aborted before the workload starts). `invoke()` resolves to an
 * `InvokeResult`. A worker issues one invocation at a time, but an invocation that timed out on the worker's side may
 * still be running when the next one is issued; a client whose invocations share state must run them in order.
 */
export interface Client {
  open(node: string): Promise<void>
  setup(): Promise<void>
  invoke(invocation: Invocation): Promise<InvokeResult>
  teardown(): Promise<void>
  close(): Promise<void>
}

export type ClientFactory = () => Client

export function ok(value?: RegisterValue): InvokeResult {
  return value === undefined ? { outcome: 'ok' } : { outcome: 'ok', value }
}

export function fail(error?: string): InvokeResult {
  return error === undefined ? { outcome: 'fail' } : { outcome: 'fail', error }
}

export function info(error?: string): InvokeResult {
  return error === undefined ? { outcome: 'info' } : { outcome: 'info', error }
}
