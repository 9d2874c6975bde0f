/**
 * Utilities for HTTP operations
 */

import { streamJson } from "@trellis/core/json.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { Readable } from "stream"
import {
  CommonHttpHeaders,
  HttpMethod,
  HttpRequestHeaders,
  HttpResponseHeaders,
  HttpStatusCode,
  type HttpBody,
  type HttpHeaders,
  type HttpPath,
  type HttpQuery,
  type HttpRequest,
  type HttpResponse,
  type QueryParameters,
} from "./index.js"
import { CommonMediaTypes } from "./media.js"

/**
 * Controls how framework generated errors are written
 */
export interface ErrorConfig {
  /** The key the message is stored under for JSON responses */
  errorKey: string
  /** Flag to write `{ [errorKey]: message }` instead of text/plain */
  useJsonResponse: boolean
}

export const DEFAULT_ERROR_CONFIG: Readonly<ErrorConfig> = {
  errorKey: "error",
  useJsonResponse: true,
}

/**
 * Create an error {@link HttpResponse} formatted with the {@link ErrorConfig}
 *
 * @param code The {@link HttpStatusCode} for the response
 * @param message The message to return
 * @param config The {@link ErrorConfig} to use
 * @returns A new {@link HttpResponse}
 */
export function errorContents(
  code: HttpStatusCode,
  message: string,
  config: ErrorConfig = DEFAULT_ERROR_CONFIG,
): HttpResponse {
  return config.useJsonResponse
    ? jsonContents({ [config.errorKey]: message }, code)
    : textContents(message, code)
}

/**
 * Creates a new content not found {@link HttpResponse}
 *
 * @param config The {@link ErrorConfig} for the body
 * @returns A new {@link HttpResponse}
 */
export function notFound(config?: ErrorConfig): HttpResponse {
  return errorContents(HttpStatusCode.NOT_FOUND, "Not Found", config)
}

/**
 * Creates a new method not allowed {@link HttpResponse}
 *
 * @param allowed The {@link HttpMethod} values to advertise in the `Allow` header
 * @param config The {@link ErrorConfig} for the body
 * @returns A new {@link HttpResponse}
 */
export function notAllowed(
  allowed: readonly HttpMethod[],
  config?: ErrorConfig,
): HttpResponse {
  const response = errorContents(
    HttpStatusCode.METHOD_NOT_ALLOWED,
    "Method Not Allowed",
    config,
  )
  response.headers.set(HttpResponseHeaders.Allow, allowed.join(", "))
  return response
}

/**
 * Create a bad request {@link HttpResponse} carrying the message
 *
 * @param message The reason the request was rejected
 * @param config The {@link ErrorConfig} for the body
 * @returns A new {@link HttpResponse}
 */
export function invalidRequest(
  message: string,
  config?: ErrorConfig,
): HttpResponse {
  return errorContents(HttpStatusCode.BAD_REQUEST, message, config)
}

/**
 * Utility to create a JSON {@link HttpBody}
 *
 * @param body The contents to write as JSON
 * @returns A new {@link HttpBody}
 */
export function jsonBody(body: unknown): HttpBody {
  return {
    mediaType: CommonMediaTypes.JSON,
    contents: streamJson(body),
  }
}

/**
 * Create a JSON formatted {@link HttpResponse}
 *
 * @param body The body to return as JSON
 * @param code The {@link HttpStatusCode} for the response (default is OK)
 * @returns A {@link HttpResponse} with the body in JSON format ready to process
 */
export function jsonContents(
  body: unknown,
  code: HttpStatusCode = HttpStatusCode.OK,
): HttpResponse {
  const headers = emptyHeaders()
  headers.set(CommonHttpHeaders.ContentType, CommonMediaTypes.JSON.toString())

  return {
    status: {
      code,
    },
    headers,
    body: jsonBody(body),
  }
}

/**
 * Create a text/plain formatted {@link HttpResponse}
 *
 * @param body The body to return as text/plain
 * @param code The {@link HttpStatusCode} for the response (default is OK)
 * @returns A {@link HttpResponse} with the body in text/plain format ready to process
 */
export function textContents(
  body: string,
  code: HttpStatusCode = HttpStatusCode.OK,
): HttpResponse {
  const mediaType = CommonMediaTypes.PLAIN
  const headers = emptyHeaders()
  headers.set(CommonHttpHeaders.ContentType, mediaType.toString())

  return {
    status: {
      code,
    },
    headers,
    body: {
      mediaType,
      contents: Readable.from([body]),
    },
  }
}

export interface CreateRequestOptions {
  /** The request path with optional query (default is '/') */
  path?: string
  /** The host (default is localhost) */
  host?: string
  /** The method override (default is GET) */
  method?: HttpMethod
  /** Additional headers to include */
  customHeaders?: Map<string, string>
  /** An optional body to include */
  body?: HttpBody
}

/**
 * Creates a new {@link HttpRequest}
 *
 * @param options The {@link CreateRequestOptions} to use
 * @returns A new {@link HttpRequest}
 */
export function createRequest(options?: CreateRequestOptions): HttpRequest {
  const headers = emptyHeaders()
  headers.set(HttpRequestHeaders.Host, options?.host ?? "localhost")

  if (options?.customHeaders) {
    for (const [name, value] of options.customHeaders) {
      headers.set(name.toLowerCase(), value)
    }
  }

  if (options?.body?.mediaType) {
    headers.set(
      CommonHttpHeaders.ContentType,
      options.body.mediaType.toString(),
    )
  }

  return {
    ...parsePath(options?.path ?? "/"),
    method: options?.method ?? HttpMethod.GET,
    headers,
    body: options?.body,
  }
}

/**
 * Custom class to build {@link HttpHeaders} from the given {@link NodeJS.Dict}
 */
export class IndexedHeaders implements HttpHeaders {
  private readonly _headers: NodeJS.Dict<string | string[]>

  constructor(headers: NodeJS.Dict<string | string[]>) {
    this._headers = headers
  }

  private _format(value?: string | string[]): Optional<string> {
    return value !== undefined
      ? Array.isArray(value)
        ? value.join(", ")
        : value
      : undefined
  }

  get(name: string): Optional<string> {
    return this._format(this._headers[name.toLowerCase()])
  }

  has(name: string): boolean {
    return this._headers[name.toLowerCase()] !== undefined
  }

  set(name: string, value: string | string[]): void {
    this._headers[name.toLowerCase()] = value
  }

  delete(name: string): void {
    delete this._headers[name.toLowerCase()]
  }

  get raw(): NodeJS.Dict<string | string[]> {
    return this._headers
  }
}

/**
 * Create an empty set of {@link HttpHeaders}
 *
 * @returns An empty set of {@link HttpHeaders}
 */
export function emptyHeaders(): HttpHeaders {
  return new IndexedHeaders({})
}

/**
 * Parse the path string into it's corresponding {@link HttpPath} and {@link HttpQuery},
 * malformed percent encoding is kept as written
 *
 * @param path The path to parse
 * @returns A {@link HttpPath} and {@link HttpQuery} representing the path
 */
export function parsePath(path: string): { path: HttpPath; query?: HttpQuery } {
  const idx = path.indexOf("?")
  const original = idx < 0 ? path : path.substring(0, idx)
  const query = idx < 0 ? "" : path.substring(idx + 1)

  return {
    path: {
      original: decodeOrKeep(original, decodeURI),
    },
    query:
      query.length > 0
        ? {
            original: query,
            parameters: parseQuery(query),
          }
        : undefined,
  }
}

/**
 * Repeated keys are collected into an array in the order they appear
 */
function parseQuery(query: string): QueryParameters {
  const parameters: QueryParameters = new Map()
  for (const segment of query.split("&")) {
    if (segment.length === 0) {
      continue
    }

    const idx = segment.indexOf("=")
    const key = decodeQueryComponent(idx < 0 ? segment : segment.substring(0, idx))
    const value = idx < 0 ? "" : decodeQueryComponent(segment.substring(idx + 1))

    const current = parameters.get(key)
    if (current === undefined) {
      parameters.set(key, value)
    } else if (Array.isArray(current)) {
      current.push(value)
    } else {
      parameters.set(key, [current, value])
    }
  }

  return parameters
}

function decodeQueryComponent(value: string): string {
  return decodeOrKeep(value.replace(/\+/g, " "), decodeURIComponent)
}

/**
 * Malformed percent encoding is left as written
 */
function decodeOrKeep(value: string, decode: (value: string) => string): string {
  try {
    return decode(value)
  } catch (err) {
    if (err instanceof URIError) {
      return value
    }

    throw err
  }
}
