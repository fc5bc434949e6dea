import { groupBy } from 'misc'

import { ClientOperation, History, isClientOperation, isNemesisOperation, Key, Operation } from './operation'

export interface FaultWindow {
  /**
   * Nanoseconds since the start of the run.
   */
  startTime: number
  /**
   * Nanoseconds. For a fault that was never stopped, lasts until the last recorded completion.
   */
  duration: number
}

/**
 * Splits the client operations of a history into per-key sub-histories (nemesis operations are dropped). Each
 * sub-history keeps the completion order of the input.
 */
export function keyPartitions(history: History): Map<Key, ClientOperation[]> {
  return groupBy(history.filter(isClientOperation), op => op.key)
}

/**
 * Pairs each fault start with the following fault stop.
 */
export function faultWindowsOf(history: History): FaultWindow[] {
  const ret: FaultWindow[] = []
  let openedAt: number | undefined
  for (const op of history.filter(isNemesisOperation)) {
    if (op.f === 'fault_start' && openedAt === undefined) {
      openedAt = op.completeTime
    } else if (op.f === 'fault_stop' && openedAt !== undefined) {
      ret.push({ startTime: openedAt, duration: op.completeTime - openedAt })
      openedAt = undefined
    }
  }

  if (openedAt !== undefined) {
    const end = history.reduce((acc, op) => Math.max(acc, op.completeTime), openedAt)
    ret.push({ startTime: openedAt, duration: end - openedAt })
  }
  return ret
}

export function describeOperation(op: Operation): string {
  const value = op.value === null ? 'nil' : Array.isArray(op.value) ? `[${op.value.join(' ')}]` : String(op.value)
  const key = op.key === null ? '' : ` k=${op.key}`
  const error = op.error ? ` (${op.error})` : ''
  return `#${op.index} p=${op.process} ${op.f}${key} ${value} -> ${op.outcome}${error}`
}
