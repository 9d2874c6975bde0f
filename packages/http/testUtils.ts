/**
 * Set of classes that are used for testing only
 */

import { consumeJsonStream, streamJson } from "@trellis/core/json.js"
import type { LogData, LogWriter } from "@trellis/core/logging.js"
import { consumeString } from "@trellis/core/streams.js"
import type { HttpMethod, HttpRequest, HttpResponse } from "./index.js"
import { CommonMediaTypes } from "./media.js"
import { createRequest, jsonContents, textContents } from "./utils.js"

/**
 * {@link LogWriter} that keeps every entry in memory
 */
export class CapturingLogWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }

  /** The messages written so far */
  get messages(): string[] {
    return this.entries.map((e) => e.message)
  }
}

/**
 * Build a request for the method and path, with an optional JSON body and
 * headers
 *
 * @param method The {@link HttpMethod}
 * @param path The path including any query
 * @param options Optional body and headers
 * @returns A new {@link HttpRequest}
 */
export function testRequest(
  method: HttpMethod,
  path: string,
  options?: { json?: unknown; headers?: Record<string, string> },
): HttpRequest {
  return createRequest({
    method,
    path,
    customHeaders: options?.headers
      ? new Map(Object.entries(options.headers))
      : undefined,
    body:
      options?.json !== undefined
        ? { mediaType: CommonMediaTypes.JSON, contents: streamJson(options.json) }
        : undefined,
  })
}

/**
 * Read the response body as JSON
 *
 * @param response The {@link HttpResponse} to read
 * @returns The parsed body or undefined when there is none
 */
export async function readJson(response: HttpResponse): Promise<unknown> {
  return response.body ? consumeJsonStream(response.body.contents) : undefined
}

/**
 * Read the response body as text
 *
 * @param response The {@link HttpResponse} to read
 * @returns The body or an empty string when there is none
 */
export async function readText(response: HttpResponse): Promise<string> {
  return response.body ? consumeString(response.body.contents) : ""
}

/** Handler returning the route name as text */
export const named = (name: string) => (): HttpResponse => textContents(name)

/** Handler echoing the captured parameters as JSON */
export const echoParameters = ({
  parameters,
}: {
  parameters: ReadonlyMap<string, string>
}): HttpResponse => jsonContents(Object.fromEntries(parameters))
