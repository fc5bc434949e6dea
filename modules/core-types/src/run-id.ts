import { Brand } from 'misc'
import * as uuid from 'uuid'

export type RunId = Brand<string, 'RunId'>

function validate(input: string): asserts input is RunId {
  if (input.length === 0) {
    throw new Error(`Bad RunId: <${input}>`)
  }
}

export function RunId(input: string): RunId {
  validate(input)
  return input
}

export function newRunId(): RunId {
  return RunId(uuid.v4())
}
