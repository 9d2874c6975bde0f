/**
 * The segment tree that backs every router
 */

import type { Optional } from "@trellis/core/type/utils.js"
import type { HttpMethod } from "../index.js"
import { ConfigurationError } from "./errors.js"
import type { Route } from "./route.js"
import { formatSegment, type Segment } from "./segments.js"

/**
 * A node in the routing tree, the root has no segment
 */
export class RouteNode {
  readonly segment?: Segment

  private _parent?: RouteNode
  private readonly _children: RouteNode[] = []
  private readonly _static = new Map<string, RouteNode>()
  private _param?: RouteNode
  private _wildcard?: RouteNode
  private readonly _routes = new Map<HttpMethod, Route>()
  private _methods: readonly HttpMethod[] = []

  constructor(segment?: Segment) {
    this.segment = segment
  }

  /** The parent node, only used to rebuild paths */
  get parent(): Optional<RouteNode> {
    return this._parent
  }

  /** Children in insertion order */
  get children(): readonly RouteNode[] {
    return this._children
  }

  get routes(): ReadonlyMap<HttpMethod, Route> {
    return this._routes
  }

  /** The bound methods in registration order */
  get methods(): readonly HttpMethod[] {
    return this._methods
  }

  get param(): Optional<RouteNode> {
    return this._param
  }

  get wildcard(): Optional<RouteNode> {
    return this._wildcard
  }

  /**
   * Find the static child with the given text
   *
   * @param text The raw segment text
   * @returns The matching {@link RouteNode} if one exists
   */
  staticChild(text: string): Optional<RouteNode> {
    return this._static.get(text)
  }

  /**
   * Find the child occupying the same slot with the same text
   *
   * @param segment The {@link Segment} to look for
   * @returns The matching child if one exists
   */
  findChild(segment: Segment): Optional<RouteNode> {
    switch (segment.type) {
      case "static":
        return this._static.get(segment.text)
      case "param": {
        const param = this._param?.segment
        return param?.type === "param" && param.name === segment.name
          ? this._param
          : undefined
      }
      case "wildcard": {
        const wildcard = this._wildcard?.segment
        return wildcard?.type === "wildcard" && wildcard.name === segment.name
          ? this._wildcard
          : undefined
      }
    }
  }

  /**
   * Find the matching child or create one
   *
   * @param segment The {@link Segment} to descend into
   * @returns The existing or new child
   *
   * @throws A {@link ConfigurationError} if a new child conflicts with an
   * existing dynamic sibling
   */
  descend(segment: Segment): RouteNode {
    const existing = this.findChild(segment)
    if (existing !== undefined) {
      return existing
    }

    const child = new RouteNode(segment)
    this.adopt(child)
    return child
  }

  /**
   * Attach the node as a child of this node
   *
   * @param child The {@link RouteNode} to attach
   *
   * @throws A {@link ConfigurationError} if the slot is already taken
   */
  adopt(child: RouteNode): void {
    const segment = this.assertVacant(child)
    switch (segment.type) {
      case "static":
        this._static.set(segment.text, child)
        break
      case "param":
        this._param = child
        break
      case "wildcard":
        this._wildcard = child
        break
    }

    this._children.push(child)
    child._parent = this
  }

  /**
   * Verify the child could be attached to this node
   *
   * @param child The candidate {@link RouteNode}
   *
   * @returns The {@link Segment} of the child
   *
   * @throws A {@link ConfigurationError} if the slot is already taken
   */
  assertVacant(child: RouteNode): Segment {
    const segment = child.segment
    if (segment === undefined) {
      throw new ConfigurationError("The root node cannot be a child")
    }

    const existing =
      segment.type === "static"
        ? this._static.get(segment.text)
        : segment.type === "param"
          ? this._param
          : this._wildcard

    if (existing !== undefined) {
      throw new ConfigurationError(
        `Cannot add ${formatSegment(segment)} under ${this.path()}, ${existing.path()} already exists`,
      )
    }

    return segment
  }

  /**
   * Verify the method is not bound at this node
   *
   * @param method The {@link HttpMethod} to check
   *
   * @throws A {@link ConfigurationError} if a route is bound for the method
   */
  assertUnbound(method: HttpMethod): void {
    const existing = this._routes.get(method)
    if (existing !== undefined) {
      throw new ConfigurationError(
        `${method} ${this.path()} is already bound to ${existing}`,
      )
    }
  }

  /**
   * Detach every child from this node
   *
   * @returns The detached children in insertion order
   */
  release(): RouteNode[] {
    const children = this._children.splice(0, this._children.length)
    this._static.clear()
    this._param = undefined
    this._wildcard = undefined
    for (const child of children) {
      child._parent = undefined
    }

    return children
  }

  /**
   * Bind the route for the method at this node
   *
   * @param method The {@link HttpMethod} to bind
   * @param route The {@link Route} to bind
   *
   * @throws A {@link ConfigurationError} if the method is already bound
   */
  bind(method: HttpMethod, route: Route): void {
    this.assertUnbound(method)

    this._routes.set(method, route)
    this._methods = Array.from(this._routes.keys())
  }

  /**
   * Move every route bound at this node onto the target
   *
   * @param target The {@link RouteNode} receiving the routes
   *
   * @throws A {@link ConfigurationError} if the target already binds one of
   * the methods
   */
  transferRoutes(target: RouteNode): void {
    for (const [method, route] of this._routes) {
      target.bind(method, route)
    }

    this._routes.clear()
    this._methods = []
  }

  /**
   * @returns The template path from the tree root to this node
   */
  path(): string {
    const parts: string[] = []
    let current: Optional<RouteNode> = this
    while (current !== undefined && current.segment !== undefined) {
      parts.unshift(formatSegment(current.segment))
      current = current.parent
    }

    return `/${parts.join("/")}`
  }
}
