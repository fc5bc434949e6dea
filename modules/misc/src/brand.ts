declare const tag: unique symbol

/**
 * A nominal refinement of `T`: a `Brand<string, 'RunId'>` is a string, but a plain string is not a RunId.
 */
export type Brand<T, Name extends string> = T & { readonly [tag]: Name }
