/**
 * This package contains some useful type manipulations used throughout the framework
 */

/**
 * Represents a value that may not be present
 */
export type Optional<T = unknown> = T | undefined
