/**
 * Http Metrics
 */

import {
  ValueType,
  type Counter,
  type Histogram,
  type Meter,
} from "@opentelemetry/api"
import { getFrameworkMeter } from "@trellis/core/observability/metrics.js"
import type { Optional } from "@trellis/core/type/utils.js"

/**
 * Metrics related to routing statistics
 */
export interface RouteMetrics {
  RouteErrors: Counter
  RouteRequestDuration: Histogram
  RouteResponseStatus: Counter
  /** Requests that never reached a route (404 / 405) */
  RoutingMisses: Counter
}

let _bound: Optional<{ meter: Meter; metrics: RouteMetrics }>

/**
 * Get the routing instruments for the current framework meter, they are
 * created again once {@link enableFrameworkMetrics} swaps the meter
 *
 * @returns The {@link RouteMetrics} bound to the current meter
 */
export function getRouteMetrics(): RouteMetrics {
  const meter = getFrameworkMeter()

  let bound = _bound
  if (bound === undefined || bound.meter !== meter) {
    bound = { meter, metrics: createRouteMetrics(meter) }
    _bound = bound
  }

  return bound.metrics
}

function createRouteMetrics(meter: Meter): RouteMetrics {
  return {
    RouteErrors: meter.createCounter("unhandled_route_errors", {
      description: "The total number of unhandled errors from a specific route",
      valueType: ValueType.INT,
    }),
    RouteRequestDuration: meter.createHistogram("incoming_route_duration", {
      description: "The amount of time the route request took to complete",
      valueType: ValueType.DOUBLE,
      unit: "seconds",
      advice: {
        explicitBucketBoundaries: [
          0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 0.75, 1,
        ],
      },
    }),
    RouteResponseStatus: meter.createCounter("route_response_status", {
      description:
        "The total number responses by status type the route has returned",
      valueType: ValueType.INT,
    }),
    RoutingMisses: meter.createCounter("routing_misses", {
      description:
        "The total number of requests that did not resolve to a route",
      valueType: ValueType.INT,
    }),
  }
}
