/**
 * Shared primitives used across the framework packages
 */

/** Simple type representing `T | PromiseLike<T>` */
export type MaybeAwaitable<T> = T | PromiseLike<T>

/**
 * Framework version stamped on meters and tracers
 */
export const TRELLIS_VERSION = "0.1.0"
