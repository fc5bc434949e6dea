import { ClientOperation, describeOperation, RegisterValue, Validity } from 'core-types'

import { step } from './cas-register'

export const DEFAULT_MAX_STEPS = 1_000_000

/**
 * Diagnostics of a sub-history that is not linearizable.
 */
export interface Witness {
  /**
   * The longest prefix of a linearization that the search could build, as operation indices.
   */
  linearized: number[]
  /**
   * The register's value after that prefix.
   */
  state: RegisterValue
  /**
   * The operation that could not be placed after the prefix.
   */
  stuckOn: string
}

export interface LinearizabilityResult {
  valid: Validity
  /**
   * The number of search states visited.
   */
  steps: number
  witness?: Witness
  message?: string
}

interface Entry {
  op: ClientOperation
  invoke: number
  /**
   * Infinity for an operation whose effect is unknown: it is never forced to have happened.
   */
  complete: number
  /**
   * Must appear in every linearization (as opposed to an indeterminate operation, which may be left out).
   */
  required: boolean
}

interface Node {
  linearized: bigint
  count: number
  state: RegisterValue
  parent: Node | undefined
  entry: number
}

function toEntries(ops: readonly ClientOperation[]): Entry[] {
  const ret: Entry[] = []
  for (const op of ops) {
    if (op.outcome === 'fail') {
      continue
    }
    if (op.outcome === 'info') {
      // An indeterminate read constrains nothing.
      if (op.f !== 'read') {
        ret.push({ op, invoke: op.invokeTime, complete: Number.POSITIVE_INFINITY, required: false })
      }
      continue
    }
    ret.push({ op, invoke: op.invokeTime, complete: op.completeTime, required: true })
  }
  return ret.sort((a, b) => a.invoke - b.invoke)
}

/**
 * Decides whether the operations of a single register are linearizable, by a depth-first search over partial
 * linearizations (Wing & Gong, with Lowe's memoization of visited (linearized set, register value) pairs).
 *
 * An operation may be linearized next if it was invoked no later than the earliest completion among the required
 * operations not yet linearized. `fail` operations are left out. Indeterminate (`info`) writes and cas-es may take effect
 * at any point after their invocation, or never; indeterminate reads are left out. The search succeeds once every
 * `ok` operation is linearized. If more than `maxSteps` states are visited the verdict is `'unknown'`.
 */
export function checkLinearizable(
  ops: readonly ClientOperation[],
  maxSteps = DEFAULT_MAX_STEPS,
  initial: RegisterValue = null,
): LinearizabilityResult {
  const entries = toEntries(ops)
  const requiredMask = entries.reduce((acc, e, i) => (e.required ? acc | (1n << BigInt(i)) : acc), 0n)

  const root: Node = { linearized: 0n, count: 0, state: initial, parent: undefined, entry: -1 }
  const visited = new Set<string>([memoKey(root)])
  const stack: Node[] = [root]
  let deepest = root
  let steps = 0

  for (let node = stack.pop(); node; node = stack.pop()) {
    ++steps
    if (steps > maxSteps) {
      return { valid: 'unknown', steps, message: `gave up after visiting ${maxSteps} states` }
    }
    if ((node.linearized & requiredMask) === requiredMask) {
      return { valid: true, steps }
    }
    if (node.count > deepest.count) {
      deepest = node
    }

    const deadline = earliestCompletion(entries, node.linearized)
    for (let i = 0; i < entries.length && entries[i].invoke <= deadline; ++i) {
      const bit = 1n << BigInt(i)
      if (node.linearized & bit) {
        continue
      }
      const next = step(node.state, entries[i].op)
      if (next === undefined) {
        continue
      }
      const child: Node = {
        linearized: node.linearized | bit,
        count: node.count + 1,
        state: next,
        parent: node,
        entry: i,
      }
      const k = memoKey(child)
      if (!visited.has(k)) {
        visited.add(k)
        stack.push(child)
      }
    }
  }

  return { valid: false, steps, witness: witnessOf(entries, deepest) }
}

function memoKey(node: Node) {
  return `${node.linearized.toString(36)}:${node.state}`
}

function earliestCompletion(entries: Entry[], linearized: bigint) {
  let ret = Number.POSITIVE_INFINITY
  entries.forEach((e, i) => {
    if (e.required && !(linearized & (1n << BigInt(i))) && e.complete < ret) {
      ret = e.complete
    }
  })
  return ret
}

function witnessOf(entries: Entry[], deepest: Node): Witness {
  const linearized: number[] = []
  for (let n: Node | undefined = deepest; n && n.entry >= 0; n = n.parent) {
    linearized.push(entries[n.entry].op.index)
  }
  linearized.reverse()

  let stuck: Entry | undefined = undefined
  for (let i = 0; i < entries.length; ++i) {
    const e = entries[i]
    if (e.required && !(deepest.linearized & (1n << BigInt(i))) && (!stuck || e.complete < stuck.complete)) {
      stuck = e
    }
  }
  return { linearized, state: deepest.state, stuckOn: stuck ? describeOperation(stuck.op) : 'nothing' }
}
