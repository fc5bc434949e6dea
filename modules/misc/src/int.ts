import { Brand } from './brand'

export type Int = Brand<number, 'Int'>

function isInt(n: number): n is Int {
  return Number.isInteger(n)
}

/**
 * Converts a number (or the decimal string of one) into an `Int`. Throws if the value is not an integer.
 */
export function Int(input: number | string): Int {
  const ret = Number(input)
  if (typeof input === 'string' && input.trim() === '') {
    throw new Error(`<${input}> is not an integer`)
  }
  if (isInt(ret)) {
    return ret
  }

  throw new Error(`<${input}> is not an integer`)
}
