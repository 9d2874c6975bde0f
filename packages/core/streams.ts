/**
 * Helpers for working with node streams
 */

import { Readable } from "stream"

/**
 * Consume the {@link Readable} and return the contents as a string
 *
 * @param readable The {@link Readable} to consume
 * @returns The contents of the {@link Readable} as a string
 */
export async function consumeString(readable: Readable): Promise<string> {
  // decoded once so characters split across chunks survive
  const chunks: Buffer[] = []
  for await (const chunk of readable) {
    chunks.push(
      Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf-8"),
    )
  }

  return Buffer.concat(chunks).toString("utf-8")
}

