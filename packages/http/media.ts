/**
 * Media type (MIME type) handling
 *
 * {@link https://www.rfc-editor.org/rfc/rfc2046.html}
 */

import type { Optional } from "@trellis/core/type/utils.js"

/**
 * The top level types for all MediaTypes
 */
export type TopLevelMediaTypes =
  | "application"
  | "text"
  | "image"
  | "audio"
  | "video"
  | "model"
  | "font"
  | "multipart"
  | "message"

/**
 * Represents a MediaType (alternatively MimeType)
 */
export interface MediaType {
  type: TopLevelMediaTypes
  subType: string
  suffix?: string
  parameters: Map<string, string>
  /** Encode the media type */
  toString(): string
}

const TOP_LEVEL_TYPES: readonly string[] = [
  "application",
  "text",
  "image",
  "audio",
  "video",
  "model",
  "font",
  "multipart",
  "message",
]

function isTopLevelMediaType(type: string): type is TopLevelMediaTypes {
  return TOP_LEVEL_TYPES.includes(type)
}

class SimpleMediaType implements MediaType {
  readonly type: TopLevelMediaTypes
  readonly subType: string
  readonly suffix?: string
  readonly parameters: Map<string, string>

  constructor(
    type: TopLevelMediaTypes,
    subType: string,
    suffix?: string,
    parameters?: Map<string, string>,
  ) {
    this.type = type
    this.subType = subType
    this.suffix = suffix
    this.parameters = parameters ?? new Map()
  }

  toString(): string {
    let value = `${this.type}/${this.subType}${this.suffix ? `+${this.suffix}` : ""}`
    for (const [key, parameter] of this.parameters) {
      value += `;${key}=${parameter}`
    }

    return value
  }
}

const MEDIA_TYPE_REGEX =
  /^([a-z]+)\/([a-z0-9.!#$&^_-]+?)(?:\+([a-z0-9.-]+))?((?:\s*;\s*[^;=\s]+=[^;]*)*)$/i

/**
 * Attempts to validate and parse the media type
 *
 * @param mediaType The string to parse
 * @returns An {@link Optional} valid {@link MediaType}
 */
export function parseMediaType(mediaType: string): Optional<MediaType> {
  const typeInfo = MEDIA_TYPE_REGEX.exec(mediaType.trim())
  if (typeInfo === null) {
    return
  }

  const type = typeInfo[1].toLowerCase()
  if (!isTopLevelMediaType(type)) {
    return
  }

  const parameters = new Map<string, string>()
  for (const parameter of (typeInfo[4] ?? "").split(";")) {
    const idx = parameter.indexOf("=")
    if (idx > 0) {
      parameters.set(
        parameter.substring(0, idx).trim().toLowerCase(),
        parameter.substring(idx + 1).trim(),
      )
    }
  }

  return new SimpleMediaType(
    type,
    typeInfo[2].toLowerCase(),
    typeInfo[3]?.toLowerCase(),
    parameters,
  )
}

/**
 * Check if the {@link MediaType} carries JSON content
 *
 * @param mediaType The {@link MediaType} to inspect
 * @returns True for `application/json` and `+json` suffixed types
 */
export function isJsonMediaType(mediaType: MediaType): boolean {
  return mediaType.subType === "json" || mediaType.suffix === "json"
}

/**
 * Common media types used by the framework responses
 */
export const CommonMediaTypes = {
  JSON: new SimpleMediaType(
    "application",
    "json",
    undefined,
    new Map([["charset", "utf-8"]]),
  ),
  PLAIN: new SimpleMediaType(
    "text",
    "plain",
    undefined,
    new Map([["charset", "utf-8"]]),
  ),
} as const
