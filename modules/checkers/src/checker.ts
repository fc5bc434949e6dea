import { CheckerResult, History, mergeValidity } from 'core-types'
import { Logger } from 'logger'
import { errorLike } from 'misc'

export interface CheckContext {
  history: History
  /**
   * The directory of the stored run. Checkers that produce files (or hand the run to another process) need it.
   */
  runDir?: string
  logger: Logger
}

export interface Checker {
  check(ctx: CheckContext): Promise<CheckerResult>
}

/**
 * Runs `checker`, turning an exception into an `'unknown'` verdict: a checker that could not finish never passes.
 */
export async function checkSafe(checker: Checker, ctx: CheckContext): Promise<CheckerResult> {
  try {
    return await checker.check(ctx)
  } catch (e) {
    ctx.logger.error('checker crashed', e)
    return { valid: 'unknown', message: `checker crashed: ${errorLike(e).message ?? String(e)}` }
  }
}

/**
 * Runs several checkers over the same history. The composed verdict is `false` if any part is `false`, otherwise
 * `'unknown'` if any part is `'unknown'`, otherwise `true`.
 */
export function compose(checkers: Record<string, Checker>): Checker {
  return {
    async check(ctx) {
      const results: Record<string, CheckerResult> = {}
      for (const [name, c] of Object.entries(checkers)) {
        results[name] = await checkSafe(c, ctx)
      }
      return { valid: mergeValidity(Object.values(results).map(r => r.valid)), results }
    },
  }
}
