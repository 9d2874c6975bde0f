/**
 * Routes bound in the routing tree
 */

import type { MaybeAwaitable } from "@trellis/core/index.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { AsyncLocalStorage } from "async_hooks"
import type { z } from "zod"
import {
  NO_FIELDS,
  type FieldBinder,
  type FieldDescriptor,
  type FieldSchema,
  type NoFields,
} from "../fields.js"
import type {
  HttpHandler,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpStatusCode,
} from "../index.js"
import { ConfigurationError } from "./errors.js"
import type { Router } from "./router.js"
import { tokenize } from "./segments.js"

export type { NoFields }

/**
 * The handler with the bound input for the request being served, read by the
 * end of the middleware chain
 */
const ROUTE_INVOCATION_STORE: AsyncLocalStorage<HttpHandler> =
  new AsyncLocalStorage()

const invokeBoundHandler: HttpHandler = (request, abort) => {
  const invoke = ROUTE_INVOCATION_STORE.getStore()
  if (invoke === undefined) {
    throw new Error("The middleware chain was invoked outside of a route")
  }

  return invoke(request, abort)
}

/**
 * Everything a {@link RouteHandler} receives for a request
 */
export interface RouteContext<T> {
  /** The {@link HttpRequest} as seen after middleware */
  readonly request: HttpRequest
  /** The bound input fields */
  readonly input: T
  /** The captured path values by name, an unnamed wildcard is `*` */
  readonly parameters: ReadonlyMap<string, string>
}

/**
 * Handles a request for a single route
 */
export type RouteHandler<T> = (
  context: RouteContext<T>,
  abort?: AbortSignal,
) => MaybeAwaitable<HttpResponse>

/**
 * Wraps the next {@link HttpHandler} in the chain
 */
export type Middleware = (next: HttpHandler) => HttpHandler

/**
 * A documented response for a status code
 */
export interface ResponseDefinition {
  status: HttpStatusCode
  schema: z.ZodTypeAny
  description?: string
}

export type Responses = Map<HttpStatusCode, ResponseDefinition>

/**
 * Connects the route handler with its fields while keeping the input type
 */
export interface RouteBinding {
  readonly descriptors: readonly FieldDescriptor[]

  /**
   * Bind the request and produce the {@link HttpHandler} that runs the route
   * handler with the bound input
   */
  prepare(
    route: Route,
    binder: FieldBinder,
    values: readonly string[],
    parameters: ReadonlyMap<string, string>,
    request: HttpRequest,
  ): Promise<HttpHandler>
}

class FieldsBinding<T> implements RouteBinding {
  private readonly _fields: FieldSchema<T>
  private readonly _handler: RouteHandler<T>

  constructor(fields: FieldSchema<T>, handler: RouteHandler<T>) {
    this._fields = fields
    this._handler = handler
  }

  get descriptors(): readonly FieldDescriptor[] {
    return this._fields.descriptors
  }

  async prepare(
    route: Route,
    binder: FieldBinder,
    values: readonly string[],
    parameters: ReadonlyMap<string, string>,
    request: HttpRequest,
  ): Promise<HttpHandler> {
    const input = await binder.bind(
      { method: route.method, fullPath: route.fullPath, fields: this._fields },
      values,
      request,
    )

    return (req, abort) =>
      this._handler({ request: req, input, parameters }, abort)
  }
}

/**
 * Create the {@link RouteBinding} for the registration arguments
 *
 * @param fieldsOrHandler The {@link FieldSchema} or the handler for routes without fields
 * @param handler The handler when fields were given
 * @returns A new {@link RouteBinding}
 */
export function createBinding<T>(
  fieldsOrHandler: FieldSchema<T> | RouteHandler<NoFields>,
  handler?: RouteHandler<T>,
): RouteBinding {
  if (typeof fieldsOrHandler === "function") {
    return new FieldsBinding(NO_FIELDS, fieldsOrHandler)
  }

  if (handler === undefined) {
    throw new ConfigurationError("A handler is required with route fields")
  }

  return new FieldsBinding(fieldsOrHandler, handler)
}

/**
 * A handler bound to a method and path on a {@link Router}
 */
export class Route {
  readonly method: HttpMethod
  /** The normalized path local to the owning router */
  readonly path: string
  readonly router: Router

  private readonly _binding: RouteBinding
  private readonly _responses: Responses = new Map()
  private _description?: string
  private _fullPath?: string
  private _handler?: HttpHandler

  constructor(
    method: HttpMethod,
    path: string,
    router: Router,
    binding: RouteBinding,
  ) {
    this.method = method
    this.path = path
    this.router = router
    this._binding = binding
  }

  get description(): Optional<string> {
    return this._description
  }

  /** The declared input fields in declaration order */
  get fields(): readonly FieldDescriptor[] {
    return this._binding.descriptors
  }

  /** Route level documented responses */
  get responses(): ReadonlyMap<HttpStatusCode, ResponseDefinition> {
    return this._responses
  }

  /**
   * The path including every mount prefix
   *
   * @throws A {@link ConfigurationError} if the tree was not frozen yet
   */
  get fullPath(): string {
    if (this._fullPath === undefined) {
      throw new ConfigurationError(
        `The full path for ${this} is not available until the tree is frozen`,
      )
    }

    return this._fullPath
  }

  /** Names of the captured values in path order */
  get parameterNames(): string[] {
    return tokenize(this.fullPath).flatMap((segment) =>
      segment.type === "static"
        ? []
        : [segment.type === "param" ? segment.name : (segment.name ?? "*")],
    )
  }

  /**
   * Attach a description for documentation
   *
   * @param description The description
   * @returns This {@link Route} for chaining
   */
  describe(description: string): this {
    this.router.assertMutable()
    this._description = description
    return this
  }

  /**
   * Document a response for the status code
   *
   * @param status The {@link HttpStatusCode}
   * @param schema The body schema
   * @param description An optional description
   * @returns This {@link Route} for chaining
   */
  withResponse(
    status: HttpStatusCode,
    schema: z.ZodTypeAny,
    description?: string,
  ): this {
    return this.withResponses({ status, schema, description })
  }

  /**
   * Document several responses at once
   *
   * @param responses The {@link ResponseDefinition} values to add
   * @returns This {@link Route} for chaining
   */
  withResponses(...responses: ResponseDefinition[]): this {
    this.router.assertMutable()
    for (const response of responses) {
      this._responses.set(response.status, response)
    }

    return this
  }

  /**
   * Fix the full path and compose the middleware chain, called once while
   * freezing
   *
   * @param fullPath The path including every mount prefix
   * @param middleware The middleware from the outermost router inwards
   */
  finalize(fullPath: string, middleware: readonly Middleware[]): void {
    if (this._fullPath !== undefined) {
      throw new ConfigurationError(`${this} was already finalized`)
    }

    let handler = invokeBoundHandler
    for (let n = middleware.length - 1; n >= 0; --n) {
      handler = middleware[n](handler)
    }

    this._fullPath = fullPath
    this._handler = handler
  }

  /**
   * Bind the request and return the middleware chain set to run the route
   * handler with the bound input
   *
   * @param binder The {@link FieldBinder} to use
   * @param values The captured values in path order
   * @param parameters The captured values by name
   * @param request The {@link HttpRequest} being served
   * @returns The composed {@link HttpHandler}
   *
   * @throws A {@link ConfigurationError} if the tree was not frozen yet
   * @throws A {@link BindingError} if the request does not fit the fields
   */
  async prepare(
    binder: FieldBinder,
    values: readonly string[],
    parameters: ReadonlyMap<string, string>,
    request: HttpRequest,
  ): Promise<HttpHandler> {
    const handler = this._handler
    if (handler === undefined) {
      throw new ConfigurationError(
        `${this} cannot serve requests until the tree is frozen`,
      )
    }

    const invoke = await this._binding.prepare(
      this,
      binder,
      values,
      parameters,
      request,
    )

    return (req, abort) =>
      ROUTE_INVOCATION_STORE.run(invoke, () => handler(req, abort))
  }

  toString(): string {
    return `${this.method} ${this._fullPath ?? this.path} (${this.router.name})`
  }
}
