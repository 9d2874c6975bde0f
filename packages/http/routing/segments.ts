/**
 * Path tokenization shared by registration, mounting and dispatch
 */

import { ConfigurationError } from "./errors.js"

/**
 * A literal segment that must match exactly
 */
export type StaticSegment = {
  type: "static"
  text: string
}

/**
 * A `{name}` segment that captures exactly one path segment
 */
export type ParamSegment = {
  type: "param"
  name: string
}

/**
 * A trailing `*` or `*name` segment that captures the remainder of the path
 */
export type WildcardSegment = {
  type: "wildcard"
  name?: string
}

/**
 * Valid segment types for a path template
 */
export type Segment = StaticSegment | ParamSegment | WildcardSegment

const PATH_SEPARATOR = "/"
const WILDCARD = "*"
const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * A raw token and the offset it starts at in the original path
 */
export interface PathToken {
  text: string
  offset: number
}

/**
 * Scan the path for tokens between `/` separators, empty tokens are dropped
 *
 * @param path The path to scan
 * @returns The {@link PathToken} values in order
 */
export function scanPath(path: string): PathToken[] {
  const tokens: PathToken[] = []

  let start = 0
  while (start <= path.length) {
    let end = path.indexOf(PATH_SEPARATOR, start)
    if (end < 0) {
      end = path.length
    }

    if (end > start) {
      tokens.push({ text: path.substring(start, end), offset: start })
    }

    start = end + 1
  }

  return tokens
}

/**
 * Split the path on `/`, empty tokens are dropped so `""`, `/` and `//` all
 * yield the root
 *
 * @param path The path to split
 * @returns The raw tokens in order
 */
export function splitPath(path: string): string[] {
  return scanPath(path).map((token) => token.text)
}

/**
 * Split the path into classified {@link Segment} values
 *
 * @param path The path or template to tokenize
 * @returns The ordered {@link Segment} list
 */
export function tokenize(path: string): Segment[] {
  return splitPath(path).map(classify)
}

function classify(token: string): Segment {
  if (token.length > 1 && token.startsWith("{") && token.endsWith("}")) {
    return { type: "param", name: token.substring(1, token.length - 1) }
  }

  if (token.startsWith(WILDCARD)) {
    return token.length > 1
      ? { type: "wildcard", name: token.substring(1) }
      : { type: "wildcard" }
  }

  return { type: "static", text: token }
}

/**
 * Verify the template is usable for registration
 *
 * @param segments The tokenized template
 * @param path The original template for error messages
 *
 * @throws A {@link ConfigurationError} if a name is not an identifier, a
 * parameter name repeats or the wildcard is not the final segment
 */
export function validateTemplate(
  segments: readonly Segment[],
  path: string,
): void {
  const names = new Set<string>()

  for (let n = 0; n < segments.length; ++n) {
    const segment = segments[n]
    switch (segment.type) {
      case "param":
        if (!IDENTIFIER_REGEX.test(segment.name)) {
          throw new ConfigurationError(
            `Invalid parameter name "${segment.name}" in ${path}`,
          )
        }
        if (names.has(segment.name)) {
          throw new ConfigurationError(
            `Duplicate parameter name "${segment.name}" in ${path}`,
          )
        }
        names.add(segment.name)
        break
      case "wildcard":
        if (n !== segments.length - 1) {
          throw new ConfigurationError(
            `Wildcard must be the final segment in ${path}`,
          )
        }
        if (segment.name !== undefined) {
          if (!IDENTIFIER_REGEX.test(segment.name)) {
            throw new ConfigurationError(
              `Invalid wildcard name "${segment.name}" in ${path}`,
            )
          }
          if (names.has(segment.name)) {
            throw new ConfigurationError(
              `Duplicate parameter name "${segment.name}" in ${path}`,
            )
          }
        }
        break
    }
  }
}

/**
 * Render the segment in template syntax
 *
 * @param segment The {@link Segment} to render
 * @returns The template text for the segment
 */
export function formatSegment(segment: Segment): string {
  switch (segment.type) {
    case "static":
      return segment.text
    case "param":
      return `{${segment.name}}`
    case "wildcard":
      return `${WILDCARD}${segment.name ?? ""}`
  }
}

/**
 * Join the path parts into a normalized `/a/b` template, the root is `/`
 *
 * @param parts The paths to join
 * @returns The normalized path
 */
export function joinPaths(...parts: string[]): string {
  const segments = parts.flatMap((part) => tokenize(part))
  return `${PATH_SEPARATOR}${segments.map(formatSegment).join(PATH_SEPARATOR)}`
}

