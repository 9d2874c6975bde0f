/**
 * Request dispatch against a frozen routing tree
 */

import { getErrorMessage } from "@trellis/core/errors.js"
import { DefaultLogger, type Logger } from "@trellis/core/logging.js"
import { getTracer, withSpan } from "@trellis/core/observability/tracing.js"
import { Timer } from "@trellis/core/time.js"
import { BindingError, DefaultFieldBinder, type FieldBinder } from "../fields.js"
import type {
  HttpHandler,
  HttpMethod,
  HttpRequest,
  HttpResponse,
} from "../index.js"
import { getRouteMetrics } from "../metrics.js"
import {
  DEFAULT_ERROR_CONFIG,
  invalidRequest,
  notAllowed,
  notFound,
  type ErrorConfig,
} from "../utils.js"
import type { Route } from "./route.js"
import type { Router } from "./router.js"
import { scanPath } from "./segments.js"
import type { RouteNode } from "./tree.js"

/**
 * Represents a request for a lookup
 */
export interface LookupRequest {
  path: string
  method: HttpMethod
}

/**
 * A route was found for the method and path
 */
export interface RouteMatch {
  type: "match"
  route: Route
  /** Captured values in path order */
  values: string[]
  /** Captured values by name, an unnamed wildcard is `*` */
  parameters: Map<string, string>
}

/**
 * Nothing is bound at the path
 */
export interface RoutingMiss {
  type: "miss"
}

/**
 * Routes exist at the path but not for the method
 */
export interface MethodMismatch {
  type: "mismatch"
  /** The methods bound at the path in registration order */
  allowed: readonly HttpMethod[]
}

export type LookupResult = RouteMatch | RoutingMiss | MethodMismatch

const ROUTING_MISS: RoutingMiss = Object.freeze({ type: "miss" })

const UNNAMED_WILDCARD = "*"

/**
 * Options for the {@link Dispatcher}
 */
export interface DispatcherOptions {
  /** The {@link FieldBinder} to use, default is {@link DefaultFieldBinder} */
  binder?: FieldBinder
  /** The {@link ErrorConfig} for 400/404/405 bodies */
  errorConfig?: ErrorConfig
  logger?: Logger
}

/**
 * Resolves requests against the tree of a root {@link Router}, freezing the
 * router if required
 */
export class Dispatcher {
  private readonly _root: RouteNode
  private readonly _binder: FieldBinder
  private readonly _errorConfig: ErrorConfig
  private readonly _logger: Logger

  constructor(router: Router, options?: DispatcherOptions) {
    router.freeze()

    this._root = router.root
    this._binder = options?.binder ?? new DefaultFieldBinder()
    this._errorConfig = options?.errorConfig ?? DEFAULT_ERROR_CONFIG
    this._logger =
      options?.logger ?? new DefaultLogger({ name: "routing.dispatcher" })
  }

  /**
   * Find the route for the request, the first matching candidate is taken at
   * each segment (static, then parameter, then wildcard) without backtracking
   *
   * @param request The {@link LookupRequest} to resolve
   * @returns The {@link LookupResult}
   */
  lookup(request: LookupRequest): LookupResult {
    const values: string[] = []
    const parameters = new Map<string, string>()

    let node = this._root
    for (const token of scanPath(request.path)) {
      const next = node.staticChild(token.text)
      if (next !== undefined) {
        node = next
        continue
      }

      if (node.param !== undefined) {
        node = node.param
        capture(node, token.text, values, parameters)
        continue
      }

      // the wildcard takes the raw remainder, separators included
      if (node.wildcard !== undefined) {
        node = node.wildcard
        capture(node, request.path.substring(token.offset), values, parameters)
        break
      }

      return ROUTING_MISS
    }

    if (node.routes.size === 0 && node.wildcard !== undefined) {
      node = node.wildcard
      capture(node, "", values, parameters)
    }

    if (node.routes.size === 0) {
      return ROUTING_MISS
    }

    const route = node.routes.get(request.method)
    if (route === undefined) {
      return { type: "mismatch", allowed: node.methods }
    }

    return { type: "match", route, values, parameters }
  }

  /**
   * Serve the request
   *
   * @param request The {@link HttpRequest} to serve
   * @param abort An optional {@link AbortSignal} passed to the handler
   * @returns The {@link HttpResponse} from the route or a 400/404/405
   */
  async handle(
    request: HttpRequest,
    abort?: AbortSignal,
  ): Promise<HttpResponse> {
    const result = this.lookup({
      method: request.method,
      path: request.path.original,
    })

    switch (result.type) {
      case "miss":
        getRouteMetrics().RoutingMisses.add(1, { reason: "not_found" })
        this._logger.debug(`No route for ${request.path.original}`)
        return notFound(this._errorConfig)
      case "mismatch":
        getRouteMetrics().RoutingMisses.add(1, {
          reason: "method_not_allowed",
        })
        this._logger.debug(
          `${request.method} is not allowed for ${request.path.original}`,
        )
        return notAllowed(result.allowed, this._errorConfig)
    }

    const route = result.route

    let handler: HttpHandler
    try {
      handler = await route.prepare(
        this._binder,
        result.values,
        result.parameters,
        request,
      )
    } catch (err) {
      if (err instanceof BindingError) {
        this._logger.debug(`Invalid request for ${route}: ${err.message}`)
        return invalidRequest(err.message, this._errorConfig)
      }

      throw err
    }

    return this._traceRoute(route, handler, request, abort)
  }

  private async _traceRoute(
    route: Route,
    handler: HttpHandler,
    request: HttpRequest,
    abort?: AbortSignal,
  ): Promise<HttpResponse> {
    const template = route.fullPath
    const metrics = getRouteMetrics()
    const span = getTracer().startSpan(template)
    const timer = Timer.startNew()

    try {
      const response = await withSpan(span, () => handler(request, abort))

      metrics.RouteResponseStatus.add(1, {
        status: response.status.code.toString(),
        template,
        method: request.method,
      })

      return response
    } catch (err) {
      metrics.RouteErrors.add(1, { template, method: request.method })
      this._logger.error(
        `Unhandled error from ${route}: ${getErrorMessage(err) ?? String(err)}`,
        err,
      )
      throw err
    } finally {
      metrics.RouteRequestDuration.record(timer.stop().seconds(), {
        template,
        method: request.method,
      })
    }
  }
}

function capture(
  node: RouteNode,
  value: string,
  values: string[],
  parameters: Map<string, string>,
): void {
  values.push(value)

  const segment = node.segment
  if (segment?.type === "param") {
    parameters.set(segment.name, value)
  } else if (segment?.type === "wildcard") {
    parameters.set(segment.name ?? UNNAMED_WILDCARD, value)
  }
}
