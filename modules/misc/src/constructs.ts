/**
 * Compile-time exhaustiveness check. Place it in the final branch of a chain of conditions over a union type: if a new
 * member is added to the union and is not handled, the argument stops being `never` and the build fails.
 *
 *   function describe(f: 'read' | 'write') {
 *     if (f === 'read') {
 *       return 'r'
 *     }
 *     if (f === 'write') {
 *       return 'w'
 *     }
 *     shouldNeverHappen(f)
 *   }
 */
export function shouldNeverHappen(n: never): never {
  // Unreachable at runtime when the types are honest.
  throw new Error(`This should never happen ${n}`)
}

/**
 * A function that always throws. Meant for the right-hand side of `??` / `||` where the left side is the happy path:
 *
 *    const dir = options.storeDir ?? failMe('storeDir is not set')
 */
export function failMe(hint?: string): never {
  if (!hint) {
    throw new Error(`This expression must never be evaluated`)
  }

  throw new Error(`Bad value: ${hint}`)
}

/**
 * Evaluates the function in `cases` that is keyed by `selector`. The compiler rejects a `cases` record that misses a
 * member of `K` (or that has an extra one).
 *
 *    const label = switchOn(op.outcome, {
 *      ok: () => 'done',
 *      fail: () => 'did not happen',
 *      info: () => 'unknown',
 *    })
 */
export function switchOn<G, K extends string>(selector: K, cases: Record<K, () => G>): G {
  const f = cases[selector]
  return f()
}

/**
 * Reads `message` and `stack` off an arbitrary thrown value. Either is `undefined` if the input has no string property
 * by that name.
 */
export function errorLike(err: unknown): { message: string | undefined; stack: string | undefined } {
  if (typeof err !== 'object' || err === null) {
    return { message: typeof err === 'string' ? err : undefined, stack: undefined }
  }
  const message = 'message' in err ? err.message : undefined
  const stack = 'stack' in err ? err.stack : undefined
  return {
    message: typeof message === 'string' ? message : undefined,
    stack: typeof stack === 'string' ? stack : undefined,
  }
}
