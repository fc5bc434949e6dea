import { ClientOperation, RegisterValue } from 'core-types'

/**
 * Applies a completed operation to a CAS register holding `state`. Returns the new state, or `undefined` if the
 * operation could not have been observed in that state.
 */
export function step(state: RegisterValue, op: ClientOperation): RegisterValue | undefined {
  if (op.f === 'read') {
    return op.value === state ? state : undefined
  }
  if (op.f === 'write') {
    return op.value
  }
  const [expected, replacement] = op.value
  return state === expected ? replacement : undefined
}
