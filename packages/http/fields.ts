/**
 * Input field declarations and the binder that populates them from requests
 */

import type { MaybeAwaitable } from "@trellis/core/index.js"
import { FrameworkError, getErrorMessage } from "@trellis/core/errors.js"
import { consumeJsonStream } from "@trellis/core/json.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { z } from "zod"
import {
  CommonHttpHeaders,
  HttpRequestHeaders,
  type HttpMethod,
  type HttpRequest,
} from "./index.js"
import { isJsonMediaType, parseMediaType } from "./media.js"

/**
 * Where a field is read from on the request
 */
export type FieldLocation = "path" | "query" | "header" | "cookie" | "body"

/**
 * Per field options, a bare {@link FieldLocation} is shorthand for `{ in }`
 */
export type FieldOptions =
  | FieldLocation
  | {
      in: FieldLocation
      deprecated?: boolean
      description?: string
    }

/**
 * Pre-computed description of a single input field
 */
export interface FieldDescriptor {
  readonly name: string
  readonly location: FieldLocation
  readonly required: boolean
  readonly description?: string
  readonly deprecated: boolean
  readonly schema: z.ZodTypeAny
}

/**
 * The validated set of fields a route accepts
 */
export class FieldSchema<T> {
  private readonly _schema: z.ZodType<T, z.ZodTypeDef, unknown>

  /** Descriptors in declaration order */
  readonly descriptors: readonly FieldDescriptor[]

  constructor(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    descriptors: readonly FieldDescriptor[],
  ) {
    this._schema = schema
    this.descriptors = descriptors
  }

  /** The path fields in the order captured values are assigned */
  get pathFields(): FieldDescriptor[] {
    return this.descriptors.filter((d) => d.location === "path")
  }

  /**
   * Validate the raw values collected from a request
   *
   * @param raw The raw values keyed by field name
   * @returns The parsed value
   *
   * @throws A {@link BindingError} listing every invalid field
   */
  parse(raw: Record<string, unknown>): T {
    const result = this._schema.safeParse(raw)
    if (result.success) {
      return result.data
    }

    throw new BindingError(
      result.error.issues.map((issue) => ({
        field: issue.path.join(".") || "(root)",
        message: issue.message,
      })),
    )
  }
}

/**
 * Declare the fields of a route from a zod object shape
 *
 * @param shape The zod shape, one entry per field
 * @param options The {@link FieldOptions} for each field in the shape
 * @returns A new {@link FieldSchema}
 */
export function defineFields<S extends z.ZodRawShape>(
  shape: S,
  options: { [K in keyof S]: FieldOptions },
): FieldSchema<z.infer<z.ZodObject<S>>> {
  const fields: z.ZodRawShape = shape
  const locations: Record<string, FieldOptions> = options

  const descriptors: FieldDescriptor[] = []
  for (const name of Object.keys(fields)) {
    const schema = fields[name]
    const fieldOptions = locations[name]
    const resolved =
      typeof fieldOptions === "string" ? { in: fieldOptions } : fieldOptions

    descriptors.push({
      name,
      location: resolved.in,
      required: !schema.isOptional(),
      description: resolved.description ?? schema.description,
      deprecated: resolved.deprecated ?? false,
      schema,
    })
  }

  return new FieldSchema<z.infer<z.ZodObject<S>>>(z.object(shape), descriptors)
}

/**
 * Input for routes that declare no fields
 */
export type NoFields = z.infer<z.ZodObject<Record<never, z.ZodTypeAny>>>

/**
 * The {@link FieldSchema} bound for routes that declare no fields
 */
export const NO_FIELDS: FieldSchema<NoFields> = defineFields<
  Record<never, z.ZodTypeAny>
>({}, {})

/**
 * A single field failure
 */
export interface FieldIssue {
  field: string
  message: string
}

/**
 * Raised when the request values cannot be bound to the route fields
 */
export class BindingError extends FrameworkError {
  readonly issues: readonly FieldIssue[]

  constructor(issues: readonly FieldIssue[], options?: ErrorOptions) {
    super(issues.map((i) => `${i.field}: ${i.message}`).join("; "), options)
    this.issues = issues
  }
}

/**
 * The route information handed to a {@link FieldBinder}
 */
export interface BindingTarget<T> {
  readonly method: HttpMethod
  readonly fullPath: string
  readonly fields: FieldSchema<T>
}

/**
 * Populates route fields from a request, invoked once per request after the
 * route was selected
 */
export interface FieldBinder {
  /**
   * Bind the request to the route fields
   *
   * @param route The {@link BindingTarget} that was matched
   * @param values The captured path values in path order
   * @param request The {@link HttpRequest} to read from
   *
   * @throws A {@link BindingError} when the fields cannot be populated
   */
  bind<T>(
    route: BindingTarget<T>,
    values: readonly string[],
    request: HttpRequest,
  ): MaybeAwaitable<T>
}

/**
 * Default {@link FieldBinder} reading each field from its declared location,
 * empty values are treated as missing
 */
export class DefaultFieldBinder implements FieldBinder {
  async bind<T>(
    route: BindingTarget<T>,
    values: readonly string[],
    request: HttpRequest,
  ): Promise<T> {
    const raw: Record<string, unknown> = {}
    let pathIndex = 0
    let body: Optional<{ value: unknown }>
    let cookies: Optional<Map<string, string>>

    for (const descriptor of route.fields.descriptors) {
      let value: unknown
      switch (descriptor.location) {
        case "path":
          value = values[pathIndex++]
          break
        case "query":
          value = request.query?.parameters.get(descriptor.name)
          break
        case "header":
          value = request.headers.get(descriptor.name.toLowerCase())
          break
        case "cookie":
          cookies ??= parseCookies(request.headers.get(HttpRequestHeaders.Cookie))
          value = cookies.get(descriptor.name)
          break
        case "body":
          body ??= { value: await readBody(request) }
          value = body.value
          break
      }

      if (value !== undefined && value !== "") {
        raw[descriptor.name] = value
      }
    }

    return route.fields.parse(raw)
  }
}

/**
 * Bodies without a known media type are read as JSON
 */
async function readBody(request: HttpRequest): Promise<unknown> {
  if (request.body === undefined) {
    return
  }

  const mediaType =
    request.body.mediaType ??
    parseMediaType(request.headers.get(CommonHttpHeaders.ContentType) ?? "")
  if (mediaType !== undefined && !isJsonMediaType(mediaType)) {
    throw new BindingError([
      { field: "body", message: `Unsupported media type ${mediaType}` },
    ])
  }

  try {
    return await consumeJsonStream(request.body.contents)
  } catch (err) {
    throw new BindingError(
      [{ field: "body", message: getErrorMessage(err) ?? "invalid JSON" }],
      { cause: err },
    )
  }
}

/**
 * Parse a `Cookie` header into name/value pairs, the first value wins
 *
 * @param header The header value
 * @returns The cookies by name
 */
export function parseCookies(header: Optional<string>): Map<string, string> {
  const cookies = new Map<string, string>()
  if (header === undefined) {
    return cookies
  }

  for (const pair of header.split(";")) {
    const idx = pair.indexOf("=")
    if (idx > 0) {
      const name = pair.substring(0, idx).trim()
      if (!cookies.has(name)) {
        cookies.set(name, pair.substring(idx + 1).trim())
      }
    }
  }

  return cookies
}
