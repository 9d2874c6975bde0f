/**
 * Tracing hooks for the framework
 */

import {
  trace as Tracing,
  context as TracingContext,
  type Span,
  type Tracer,
} from "@opentelemetry/api"
import { TRELLIS_VERSION, type MaybeAwaitable } from "../index.js"
import type { Optional } from "../type/utils.js"

let FRAMEWORK_TRACER: Optional<Tracer>

/**
 * Return the framework {@link Tracer}
 */
export function getTracer(): Tracer {
  return (
    FRAMEWORK_TRACER ??
    (FRAMEWORK_TRACER = Tracing.getTracer("trellis-framework", TRELLIS_VERSION))
  )
}

/**
 * Run the function with the {@link Span} active, ending the span when the
 * function (or the promise it returns) completes
 *
 * @param span The {@link Span} to activate
 * @param fn The function to run
 * @returns The result of the function
 */
export async function withSpan<T>(
  span: Span,
  fn: () => MaybeAwaitable<T>,
): Promise<T> {
  try {
    return await TracingContext.with(
      Tracing.setSpan(TracingContext.active(), span),
      fn,
    )
  } finally {
    span.end()
  }
}
