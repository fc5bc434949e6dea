import { z } from 'zod'

export const Outcome = z.enum(['ok', 'fail', 'info'])
/**
 * `ok`: the operation took effect. `fail`: it provably did not. `info`: its effect is unknown (e.g., a timeout).
 */
export type Outcome = z.infer<typeof Outcome>

export const ClientFunction = z.enum(['read', 'write', 'cas'])
export type ClientFunction = z.infer<typeof ClientFunction>

export const FaultFunction = z.enum(['fault_start', 'fault_stop'])
export type FaultFunction = z.infer<typeof FaultFunction>

export type OpFunction = ClientFunction | FaultFunction

/**
 * Keys are drawn from an unbounded, increasing sequence of non-negative integers.
 */
export type Key = number

/**
 * The content of a CAS register. `null` means "never written".
 */
export type RegisterValue = number | null

const Value = z.number().int()

const timing = {
  index: z.number().int().nonnegative(),
  /**
   * Nanoseconds since the start of the run.
   */
  invokeTime: z.number().nonnegative(),
  /**
   * Nanoseconds since the start of the run.
   */
  completeTime: z.number().nonnegative(),
  error: z.string().optional(),
}

const clientBase = {
  ...timing,
  process: z.number().int().nonnegative(),
  key: z.number().int().nonnegative(),
  outcome: Outcome,
}

const nemesisBase = {
  ...timing,
  process: z.literal('nemesis'),
  key: z.null(),
  /**
   * A human-readable description of the fault (e.g., the partition grouping).
   */
  value: z.string().nullable(),
  outcome: z.literal('info'),
}

export const ReadOperation = z.object({ ...clientBase, f: z.literal('read'), value: Value.nullable() })
export const WriteOperation = z.object({ ...clientBase, f: z.literal('write'), value: Value })
export const CasOperation = z.object({ ...clientBase, f: z.literal('cas'), value: z.tuple([Value, Value]) })
export const FaultStartOperation = z.object({ ...nemesisBase, f: z.literal('fault_start') })
export const FaultStopOperation = z.object({ ...nemesisBase, f: z.literal('fault_stop') })

export const Operation = z
  .discriminatedUnion('f', [ReadOperation, WriteOperation, CasOperation, FaultStartOperation, FaultStopOperation])
  .refine(op => op.completeTime >= op.invokeTime, { message: 'completeTime must not precede invokeTime' })

export type ReadOperation = z.infer<typeof ReadOperation>
export type WriteOperation = z.infer<typeof WriteOperation>
export type CasOperation = z.infer<typeof CasOperation>
export type ClientOperation = ReadOperation | WriteOperation | CasOperation
export type NemesisOperation = z.infer<typeof FaultStartOperation> | z.infer<typeof FaultStopOperation>
export type Operation = ClientOperation | NemesisOperation

/**
 * A completion-ordered, indexed sequence of operations of a single run.
 */
export type History = readonly Operation[]

/**
 * What a generator asks a client to do. A `read` carries no payload; its value is filled in on completion.
 */
export type Invocation =
  | { f: 'read'; key: Key; value: null }
  | { f: 'write'; key: Key; value: number }
  | { f: 'cas'; key: Key; value: [expected: number, replacement: number] }

export function isClientOperation(op: Operation): op is ClientOperation {
  return op.process !== 'nemesis'
}

export function isNemesisOperation(op: Operation): op is NemesisOperation {
  return op.process === 'nemesis'
}
