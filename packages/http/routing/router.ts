/**
 * Routers own a segment tree and the routes registered on it, routers can be
 * mounted inside each other to build the final tree
 */

import { DefaultLogger, type Logger } from "@trellis/core/logging.js"
import type { Optional } from "@trellis/core/type/utils.js"
import type { z } from "zod"
import type { FieldDescriptor, FieldSchema } from "../fields.js"
import { HttpMethod, type HttpStatusCode } from "../index.js"
import { ConfigurationError, ConfigurationErrors } from "./errors.js"
import {
  Route,
  createBinding,
  type Middleware,
  type NoFields,
  type ResponseDefinition,
  type Responses,
  type RouteHandler,
} from "./route.js"
import {
  formatSegment,
  joinPaths,
  tokenize,
  validateTemplate,
} from "./segments.js"
import { RouteNode } from "./tree.js"

/**
 * Options for creating a {@link Router}
 */
export interface RouterOptions {
  /** The router name used in logs and errors */
  name?: string
  /** The documentation tag, defaults to the name */
  tag?: string
  description?: string
  logger?: Logger
}

/**
 * Documentation view of a single route
 */
export interface RouteDocumentation {
  method: HttpMethod
  fullPath: string
  tag: string
  description?: string
  /** Declared fields in declaration order */
  parameters: readonly FieldDescriptor[]
  /** Names of the captured path values in path order */
  pathParameters: string[]
  /** Router level responses overridden by route level ones, by status */
  responses: ResponseDefinition[]
}

let ROUTER_ID = 0

/**
 * A collection of routes sharing a mount prefix, middleware and documentation
 */
export class Router {
  readonly name: string
  readonly tag: string
  readonly description?: string

  protected readonly _logger: Logger

  private _root: RouteNode = new RouteNode()
  private readonly _routes: Route[] = []
  private readonly _routers: Router[] = []
  private readonly _middleware: Middleware[] = []
  private readonly _responses: Responses = new Map()
  private _parent?: Router
  private _prefix = ""
  private _frozen = false

  constructor(options?: RouterOptions) {
    this.name = options?.name ?? `router-${++ROUTER_ID}`
    this.tag = options?.tag ?? this.name
    this.description = options?.description
    this._logger =
      options?.logger ?? new DefaultLogger({ name: `router.${this.name}` })
  }

  /** The root of this router's tree, the mount node once mounted */
  get root(): RouteNode {
    return this._root
  }

  get parent(): Optional<Router> {
    return this._parent
  }

  /** The mount prefix, empty until mounted */
  get prefix(): string {
    return this._prefix
  }

  /** Routes registered directly on this router */
  get ownRoutes(): readonly Route[] {
    return this._routes
  }

  /** Routers mounted on this router */
  get routers(): readonly Router[] {
    return this._routers
  }

  get frozen(): boolean {
    return this._frozen
  }

  /** Router level documented responses */
  get responses(): ReadonlyMap<HttpStatusCode, ResponseDefinition> {
    return this._responses
  }

  /**
   * Verify the tree can still be changed
   *
   * @throws A {@link ConfigurationError} once the tree is frozen
   */
  assertMutable(): void {
    if (this._frozen) {
      throw new ConfigurationError(
        `Router ${this.name} is frozen and cannot be modified`,
      )
    }
  }

  /**
   * Register a handler for the method and path
   *
   * @param method The {@link HttpMethod} to bind
   * @param path The path template, relative to this router
   * @param handler The {@link RouteHandler} to invoke
   * @returns The new {@link Route}
   *
   * @throws A {@link ConfigurationError} if the template is invalid or the
   * method is already bound at the path
   */
  register(
    method: HttpMethod,
    path: string,
    handler: RouteHandler<NoFields>,
  ): Route
  register<T>(
    method: HttpMethod,
    path: string,
    fields: FieldSchema<T>,
    handler: RouteHandler<T>,
  ): Route
  register<T>(
    method: HttpMethod,
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(method, path, fieldsOrHandler, handler)
  }

  get(path: string, handler: RouteHandler<NoFields>): Route
  get<T>(path: string, fields: FieldSchema<T>, handler: RouteHandler<T>): Route
  get<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.GET, path, fieldsOrHandler, handler)
  }

  post(path: string, handler: RouteHandler<NoFields>): Route
  post<T>(path: string, fields: FieldSchema<T>, handler: RouteHandler<T>): Route
  post<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.POST, path, fieldsOrHandler, handler)
  }

  put(path: string, handler: RouteHandler<NoFields>): Route
  put<T>(path: string, fields: FieldSchema<T>, handler: RouteHandler<T>): Route
  put<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.PUT, path, fieldsOrHandler, handler)
  }

  patch(path: string, handler: RouteHandler<NoFields>): Route
  patch<T>(path: string, fields: FieldSchema<T>, handler: RouteHandler<T>): Route
  patch<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.PATCH, path, fieldsOrHandler, handler)
  }

  delete(path: string, handler: RouteHandler<NoFields>): Route
  delete<T>(
    path: string,
    fields: FieldSchema<T>,
    handler: RouteHandler<T>,
  ): Route
  delete<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.DELETE, path, fieldsOrHandler, handler)
  }

  head(path: string, handler: RouteHandler<NoFields>): Route
  head<T>(path: string, fields: FieldSchema<T>, handler: RouteHandler<T>): Route
  head<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.HEAD, path, fieldsOrHandler, handler)
  }

  options(path: string, handler: RouteHandler<NoFields>): Route
  options<T>(
    path: string,
    fields: FieldSchema<T>,
    handler: RouteHandler<T>,
  ): Route
  options<T>(
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    return this._add(HttpMethod.OPTIONS, path, fieldsOrHandler, handler)
  }

  /**
   * Mount the router at the prefix, the sub router's nodes move into this
   * tree and later registrations on it land beneath the prefix
   *
   * @param prefix The slash rooted prefix to mount at
   * @param router The {@link Router} to mount
   * @returns This {@link Router} for chaining
   *
   * @throws A {@link ConfigurationError} if the prefix is invalid, the router
   * is this router, already mounted, an ancestor of this router or either
   * tree is frozen
   */
  mount(prefix: string, router: Router): this {
    this.assertMutable()
    router.assertMutable()

    if (prefix.length === 0 || !prefix.startsWith("/")) {
      throw new ConfigurationError(
        `Mount prefix "${prefix}" for ${router.name} must start with "/"`,
      )
    }

    if (router === this) {
      throw new ConfigurationError(`Router ${this.name} cannot mount itself`)
    }

    if (router._parent !== undefined) {
      throw new ConfigurationError(
        `Router ${router.name} is already mounted on ${router._parent.name}`,
      )
    }

    for (
      let ancestor: Optional<Router> = this._parent;
      ancestor !== undefined;
      ancestor = ancestor._parent
    ) {
      if (ancestor === router) {
        throw new ConfigurationError(
          `Router ${router.name} is an ancestor of ${this.name} and cannot be mounted on it`,
        )
      }
    }

    const segments = tokenize(prefix)
    if (segments.some((s) => s.type === "wildcard")) {
      throw new ConfigurationError(
        `Mount prefix "${prefix}" cannot contain a wildcard`,
      )
    }
    validateTemplate(segments, prefix)

    let mountNode = this._root
    for (const segment of segments) {
      mountNode = mountNode.descend(segment)
    }

    const previous = router._root
    for (const child of previous.children) {
      mountNode.assertVacant(child)
    }
    for (const method of previous.methods) {
      mountNode.assertUnbound(method)
    }

    for (const child of previous.release()) {
      mountNode.adopt(child)
    }
    previous.transferRoutes(mountNode)
    router._rebase(previous, mountNode)

    this._routers.push(router)
    router._parent = this
    router._prefix = joinPaths(prefix)

    this._logger.debug(`Mounted ${router.name} at ${router._prefix}`)
    return this
  }

  /**
   * Add middleware to every route on this router and the routers mounted
   * on it, the first middleware added runs first
   *
   * @param middleware The {@link Middleware} to add
   * @returns This {@link Router} for chaining
   */
  use(middleware: Middleware): this {
    this.assertMutable()
    this._middleware.push(middleware)
    return this
  }

  /**
   * Document a response for every route on this router and the routers
   * mounted on it
   *
   * @param status The {@link HttpStatusCode}
   * @param schema The body schema
   * @param description An optional description
   * @returns This {@link Router} for chaining
   */
  withResponse(
    status: HttpStatusCode,
    schema: z.ZodTypeAny,
    description?: string,
  ): this {
    return this.withResponses({ status, schema, description })
  }

  /**
   * Document several router level responses at once
   *
   * @param responses The {@link ResponseDefinition} values to add
   * @returns This {@link Router} for chaining
   */
  withResponses(...responses: ResponseDefinition[]): this {
    this.assertMutable()
    for (const response of responses) {
      this._responses.set(response.status, response)
    }

    return this
  }

  /**
   * Collect every route on this router followed by the routes of each
   * mounted router, depth first
   *
   * @returns The {@link RouteDocumentation} for each route
   *
   * @throws A {@link ConfigurationError} if the tree is not frozen
   */
  allRoutes(): RouteDocumentation[] {
    const documentation: RouteDocumentation[] = []
    for (const route of this._collectRoutes()) {
      const responses: Responses = new Map()
      for (const router of route.router._lineage()) {
        for (const [status, response] of router._responses) {
          responses.set(status, response)
        }
      }
      for (const [status, response] of route.responses) {
        responses.set(status, response)
      }

      documentation.push({
        method: route.method,
        fullPath: route.fullPath,
        tag: route.router.tag,
        description: route.description,
        parameters: route.fields,
        pathParameters: route.parameterNames,
        responses: Array.from(responses.values()).sort(
          (l, r) => l.status - r.status,
        ),
      })
    }

    return documentation
  }

  /**
   * Compute the full paths, compose the middleware and validate the fields
   * of every route, then lock the whole tree against changes
   *
   * @throws A {@link ConfigurationError} if this router is mounted
   * @throws A {@link ConfigurationErrors} listing every invalid route
   */
  freeze(): void {
    if (this._parent !== undefined) {
      throw new ConfigurationError(
        `Router ${this.name} is mounted on ${this._parent.name}, only the root can be frozen`,
      )
    }

    if (this._frozen) {
      return
    }

    const errors: ConfigurationError[] = []
    const pending: [Route, string, readonly Middleware[]][] = []
    this._resolve("", [], pending, errors)

    if (errors.length > 0) {
      throw new ConfigurationErrors(errors)
    }

    for (const [route, fullPath, middleware] of pending) {
      route.finalize(fullPath, middleware)
      this._logger.debug(`Serving ${route.method} ${fullPath}`)
    }

    this._lock()
  }

  /**
   * Render the routing tree as text, one node per line with the bound
   * methods
   *
   * @returns The rendered tree
   */
  visualize(): string {
    const lines = [describeNode("/", this._root)]
    const children = this._root.children
    for (let n = 0; n < children.length; ++n) {
      renderNode(children[n], "", n === children.length - 1, lines)
    }

    return lines.join("\n")
  }

  toString(): string {
    return `Router(${this.name}${this._prefix ? ` @ ${this._prefix}` : ""})`
  }

  private _add<T>(
    method: HttpMethod,
    path: string,
    fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
    handler?: RouteHandler<T>,
  ): Route {
    this.assertMutable()

    const segments = tokenize(path)
    validateTemplate(segments, path)

    let node = this._root
    for (const segment of segments) {
      node = node.descend(segment)
    }

    const route = new Route(
      method,
      joinPaths(path),
      this,
      createBinding(fieldsOrHandler, handler),
    )
    node.bind(method, route)
    this._routes.push(route)

    this._logger.debug(`Registered ${method} ${route.path}`)
    return route
  }

  private _collectRoutes(): Route[] {
    return [
      ...this._routes,
      ...this._routers.flatMap((router) => router._collectRoutes()),
    ]
  }

  /** Routers from the tree root down to this router */
  private _lineage(): Router[] {
    const lineage: Router[] = []
    for (
      let router: Optional<Router> = this;
      router !== undefined;
      router = router._parent
    ) {
      lineage.unshift(router)
    }

    return lineage
  }

  /** Point every router sharing the previous root at the mount node */
  private _rebase(previous: RouteNode, next: RouteNode): void {
    if (this._root === previous) {
      this._root = next
    }

    for (const router of this._routers) {
      router._rebase(previous, next)
    }
  }

  private _resolve(
    parentPath: string,
    parentMiddleware: readonly Middleware[],
    pending: [Route, string, readonly Middleware[]][],
    errors: ConfigurationError[],
  ): void {
    const basePath = joinPaths(parentPath, this._prefix)
    const middleware = [...parentMiddleware, ...this._middleware]

    for (const route of this._routes) {
      const fullPath = joinPaths(basePath, route.path)
      const segments = tokenize(fullPath)

      try {
        validateTemplate(segments, fullPath)
      } catch (err) {
        if (err instanceof ConfigurationError) {
          errors.push(err)
          continue
        }
        throw err
      }

      const dynamic = segments.filter((s) => s.type !== "static").length
      const pathFields = route.fields.filter((f) => f.location === "path")
      if (route.fields.length > 0 && pathFields.length !== dynamic) {
        errors.push(
          new ConfigurationError(
            `${route.method} ${fullPath} declares ${pathFields.length} path field(s) but the path captures ${dynamic}`,
          ),
        )
        continue
      }

      pending.push([route, fullPath, middleware])
    }

    for (const router of this._routers) {
      router._resolve(basePath, middleware, pending, errors)
    }
  }

  private _lock(): void {
    this._frozen = true
    for (const router of this._routers) {
      router._lock()
    }
  }
}

function describeNode(label: string, node: RouteNode): string {
  return node.methods.length > 0
    ? `${label} | Methods: ${node.methods.join(", ")}`
    : label
}

function renderNode(
  node: RouteNode,
  prefix: string,
  isLast: boolean,
  lines: string[],
): void {
  const label = node.segment !== undefined ? formatSegment(node.segment) : "/"
  lines.push(`${prefix}${isLast ? "└── " : "├── "}${describeNode(label, node)}`)

  const childPrefix = `${prefix}${isLast ? "    " : "│   "}`
  const children = node.children
  for (let n = 0; n < children.length; ++n) {
    renderNode(children[n], childPrefix, n === children.length - 1, lines)
  }
}
