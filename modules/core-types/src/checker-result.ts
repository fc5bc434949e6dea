import { z } from 'zod'

export const Validity = z.union([z.boolean(), z.literal('unknown')])
/**
 * The verdict of a checker. `'unknown'` means that the checking mechanism itself could not reach a verdict; it is
 * never a synonym of `true`.
 */
export type Validity = z.infer<typeof Validity>

export interface CheckerResult {
  valid: Validity
  message?: string
  /**
   * Checker-specific, JSON-serializable diagnostics (witnesses, statistics, file locations, ...).
   */
  details?: Record<string, unknown>
  /**
   * Present on the result of a composed checker: the results of its parts, by name.
   */
  results?: Record<string, CheckerResult>
}

export const CheckerResultShape: z.ZodType<CheckerResult> = z.lazy(() =>
  z.object({
    valid: Validity,
    message: z.string().optional(),
    details: z.record(z.string(), z.unknown()).optional(),
    results: z.record(z.string(), CheckerResultShape).optional(),
  }),
)

/**
 * Combines verdicts: any `false` wins, then any `'unknown'`; only all-`true` (or nothing at all) yields `true`.
 */
export function mergeValidity(vs: Iterable<Validity>): Validity {
  let ret: Validity = true
  for (const v of vs) {
    if (v === false) {
      return false
    }
    if (v === 'unknown') {
      ret = 'unknown'
    }
  }
  return ret
}

export function validityToString(v: Validity): string {
  return v === true ? 'valid' : v === false ? 'invalid' : 'unknown'
}
