import { HarnessError } from 'harness-error'
import { switchOn } from 'misc'

import { Checker, compose } from './checker'
import { externalChecker, ExternalCheckerOptions } from './external-checker'
import { linearizable, LinearizableOptions } from './independent'
import { perf } from './perf'
import { timeline } from './timeline'

/**
 * `live`: analysis right after a run. `reanalysis`: analysis of a stored run.
 */
export type CheckerMode = 'live' | 'reanalysis'

export type Correctness = 'skip' | 'internal' | 'external'

export interface CheckerFlags {
  skipChecker: boolean
  useExternal: boolean
}

/**
 * Picks the correctness checker. Skipping is honored only right after a run; an explicit re-analysis always analyzes.
 * The external checker is used only in re-analysis, where it wins over the internal one.
 */
export function selectCorrectness(mode: CheckerMode, flags: CheckerFlags): Correctness {
  return switchOn<Correctness, CheckerMode>(mode, {
    live: () => (flags.skipChecker ? 'skip' : 'internal'),
    reanalysis: () => (flags.useExternal ? 'external' : 'internal'),
  })
}

export interface CheckerSetOptions {
  linearizable?: LinearizableOptions
  /**
   * Required for the external checker.
   */
  external?: ExternalCheckerOptions
}

/**
 * The full checker set for a correctness choice: the correctness checker plus the performance summary and the
 * timeline, which are always attached. `undefined` if analysis is skipped.
 */
export function buildCheckerSet(correctness: Correctness, options: CheckerSetOptions = {}): Checker | undefined {
  if (correctness === 'skip') {
    return undefined
  }
  const aux = { perf: perf(), timeline: timeline() }
  if (correctness === 'internal') {
    return compose({ linear: linearizable(options.linearizable), ...aux })
  }
  const external = options.external
  if (!external) {
    throw new HarnessError('the external checker was selected but no executable was configured', 'options')
  }
  return compose({ external: externalChecker(external), ...aux })
}
