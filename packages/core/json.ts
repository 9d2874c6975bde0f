/**
 * Handles some JSON operations to make life a little easier, still relies on
 * the built-in tooling around JSON parsing
 */

import { Readable } from "stream"
import { consumeString } from "./streams.js"

/**
 * Translates the contents into a {@link Readable}, arrays are written one
 * element at a time
 *
 * @param contents The contents to translate into a JSON stream
 * @returns A {@link Readable} with the contents
 */
export function streamJson(contents: unknown): Readable {
  return Readable.from(iterateObject(contents), {
    objectMode: false,
    autoDestroy: true,
    emitClose: true,
  })
}

/**
 * Read the full {@link Readable} and parse it as JSON
 *
 * @param readable The {@link Readable} to consume
 * @returns The parsed value or undefined if the stream was empty
 *
 * @throws A {@link SyntaxError} if the contents are not valid JSON
 */
export async function consumeJsonStream(readable: Readable): Promise<unknown> {
  const contents = await consumeString(readable)
  return contents.trim().length > 0 ? JSON.parse(contents) : undefined
}

function* iterateObject(contents: unknown): Generator<string, void, never> {
  if (Array.isArray(contents)) {
    yield "["
    for (let n = 0; n < contents.length; ++n) {
      if (n > 0) {
        yield ","
      }
      yield JSON.stringify(contents[n]) ?? "null"
    }
    yield "]"
  } else {
    yield JSON.stringify(contents) ?? "null"
  }
}
