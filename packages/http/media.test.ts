import { CommonMediaTypes, isJsonMediaType, parseMediaType } from "./media.js"

describe("Media types", () => {
  test("Valid media types should parse", () => {
    const mediaType = parseMediaType("Application/Problem+JSON; charset=UTF-8")

    expect(mediaType?.type).toBe("application")
    expect(mediaType?.subType).toBe("problem")
    expect(mediaType?.suffix).toBe("json")
    expect(mediaType?.parameters.get("charset")).toBe("UTF-8")
    expect(mediaType?.toString()).toBe("application/problem+json;charset=UTF-8")
    expect(mediaType && isJsonMediaType(mediaType)).toBe(true)
  })

  test("Invalid media types should be rejected", () => {
    expect(parseMediaType("json")).toBeUndefined()
    expect(parseMediaType("unknown/thing")).toBeUndefined()
  })

  test("Common media types should render", () => {
    expect(CommonMediaTypes.JSON.toString()).toBe("application/json;charset=utf-8")
    expect(isJsonMediaType(CommonMediaTypes.PLAIN)).toBe(false)
  })
})
