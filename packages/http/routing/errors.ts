/**
 * Errors raised while configuring the routing tree
 */

import { FrameworkError } from "@trellis/core/errors.js"

/**
 * Custom {@link Error} raised when the routing tree cannot be built as
 * requested (invalid templates, overlapping routes, mount misuse or mutation
 * after the tree was frozen)
 */
export class ConfigurationError extends FrameworkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }
}

/**
 * Aggregate of every {@link ConfigurationError} found while freezing a tree
 */
export class ConfigurationErrors extends FrameworkError {
  readonly errors: readonly ConfigurationError[]

  constructor(errors: readonly ConfigurationError[]) {
    super(
      `${errors.length} configuration error(s): ${errors
        .map((e) => e.message)
        .join("; ")}`,
    )
    this.errors = errors
  }
}
