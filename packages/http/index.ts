/**
 * Core package definitions and interfaces
 */

import type { MaybeAwaitable } from "@trellis/core/index.js"
import type { Optional } from "@trellis/core/type/utils.js"
import type { Readable } from "stream"
import type { MediaType } from "./media.js"

/**
 * Query parameters are named parameters that can be singular or an array
 */
export type QueryParameters = Map<string, string | string[]>

/**
 * HttpHeaders are collections of key, value pairs where the value can be singular or an array
 */
export interface HttpHeaders {
  /**
   * Get the header with the given name
   *
   * @param name The header name
   */
  get(name: string): Optional<string>

  /**
   * Check if the header with the name exists
   *
   * @param name The header name
   */
  has(name: string): boolean

  /**
   * Set the name of the header
   *
   * @param name The header to set
   * @param value The value to set
   */
  set(name: string, value: string | string[]): void

  /**
   * Delete the header with the given name
   *
   * @param name The header to delete
   */
  delete(name: string): void

  /**
   * Gets the raw underlying headers
   */
  readonly raw: NodeJS.Dict<string | string[]>
}

/**
 * Common headers for requests and responses (lowercase)
 */
export enum CommonHttpHeaders {
  CacheControl = "cache-control",
  ContentLength = "content-length",
  ContentType = "content-type",
  Date = "date",
}

/**
 * Headers for requests (lowercase)
 */
export enum HttpRequestHeaders {
  Accept = "accept",
  Authorization = "authorization",
  Cookie = "cookie",
  Host = "host",
  UserAgent = "user-agent",
}

/**
 * Headers for responses (lowercase)
 */
export enum HttpResponseHeaders {
  Allow = "allow",
  Location = "location",
  SetCookie = "set-cookie",
}

/**
 * Supported methods for HTTP operations
 */
export enum HttpMethod {
  DELETE = "DELETE",
  GET = "GET",
  HEAD = "HEAD",
  OPTIONS = "OPTIONS",
  PATCH = "PATCH",
  POST = "POST",
  PUT = "PUT",
}

/**
 * Set of status codes with names
 */
export enum HttpStatusCode {
  OK = 200,
  CREATED = 201,
  ACCEPTED = 202,
  NO_CONTENT = 204,
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  METHOD_NOT_ALLOWED = 405,
  CONFLICT = 409,
  UNPROCESSABLE_ENTITY = 422,
  INTERNAL_SERVER_ERROR = 500,
  NOT_IMPLEMENTED = 501,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Represents the HTTP Status object
 */
export interface HttpStatus {
  code: HttpStatusCode
  message?: string
}

/**
 * An interface defining the query portion of a request
 */
export interface HttpQuery {
  readonly original: string
  parameters: QueryParameters
}

/**
 * An interface defining the path portion of a request
 */
export interface HttpPath {
  readonly original: string
}

/**
 * An interface defining the body that is transmitted as part of the request/response cycle
 */
export interface HttpBody {
  /** The {@link MediaType} if known */
  mediaType?: MediaType
  /** The {@link Readable} contents */
  contents: Readable
}

/**
 * An interface defining the behavior of an HTTP Request
 */
export interface HttpRequest {
  readonly path: HttpPath
  readonly method: HttpMethod
  readonly headers: HttpHeaders
  readonly query?: HttpQuery
  readonly body?: HttpBody
}

/**
 * An interface defining the shape of an HTTP Response
 */
export interface HttpResponse {
  /** The {@link HttpStatus} to return */
  readonly status: HttpStatus
  /** The {@link HttpHeaders} to include in the response */
  readonly headers: HttpHeaders
  /** The {@link HttpBody} to return */
  readonly body?: HttpBody
}

/**
 * Simple type for handling a {@link HttpRequest}
 */
export type HttpHandler = (
  request: HttpRequest,
  abort?: AbortSignal,
) => MaybeAwaitable<HttpResponse>
