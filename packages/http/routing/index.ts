/**
 * Package containing all of the routing information for associating a given
 * path/method combination with a handler
 */

export {
  Dispatcher,
  type DispatcherOptions,
  type LookupRequest,
  type LookupResult,
  type MethodMismatch,
  type RouteMatch,
  type RoutingMiss,
} from "./dispatcher.js"
export { ConfigurationError, ConfigurationErrors } from "./errors.js"
export {
  Route,
  type Middleware,
  type NoFields,
  type ResponseDefinition,
  type RouteContext,
  type RouteHandler,
} from "./route.js"
export {
  Router,
  type RouteDocumentation,
  type RouterOptions,
} from "./router.js"
export {
  joinPaths,
  tokenize,
  validateTemplate,
  type Segment,
} from "./segments.js"
export { RouteNode } from "./tree.js"
