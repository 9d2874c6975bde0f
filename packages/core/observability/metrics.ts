/**
 * Helps to bootstrap the metrics for this framework
 */

import opentelemetry, { createNoopMeter, type Meter } from "@opentelemetry/api"
import { TRELLIS_VERSION } from "../index.js"

let _metricsEnabled = false
let _meter: Meter = createNoopMeter()

/**
 * Get the framework {@link Meter}, this is a NO_OP unless
 * {@link enableFrameworkMetrics} was invoked first
 *
 * @returns The current {@link Meter}
 */
export function getFrameworkMeter(): Meter {
  return _meter
}

/**
 * Enable the framework metrics using the globally registered meter provider
 *
 * Instruments created before this call stay bound to the no-op meter
 */
export function enableFrameworkMetrics(): void {
  if (!_metricsEnabled) {
    _meter = opentelemetry.metrics
      .getMeterProvider()
      .getMeter("trellis-framework-metrics", TRELLIS_VERSION)
  }
  _metricsEnabled = true
}
