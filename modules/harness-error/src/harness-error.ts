type HintType =
  /**
   * A backend adapter or fault injector could not be opened or set up. The run is aborted before any workload runs.
   */
  | 'setup'
  /**
   * A stored run could not be loaded for re-analysis (missing, unreadable, malformed, or not produced by `run`).
   */
  | 'input'
  /**
   * The operator passed an invalid option value.
   */
  | 'options'

/**
 * A fatal, operator-visible failure. Operation-level failures are never reported this way: they are recorded in the
 * history as `fail`/`info` outcomes.
 */
export class HarnessError extends Error {
  constructor(m: string, readonly hint: HintType) {
    super(m)

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, HarnessError.prototype)
  }
}

export function isHarnessError(e: unknown): e is HarnessError {
  return e instanceof HarnessError
}
