import type { Optional } from "./type/utils.js"

/**
 * Base class for errors raised by the framework that keeps the subclass name
 * on the instance so it survives serialization and logging
 */
export abstract class FrameworkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Try to extract the message field of the error
 *
 * @param error The error object to extract from
 * @returns The error message if it exists or undefined
 */
export function getErrorMessage(error: unknown): Optional<string> {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message
  }

  return
}
