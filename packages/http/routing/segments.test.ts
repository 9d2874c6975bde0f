import { ConfigurationError } from "./errors.js"
import {
  joinPaths,
  scanPath,
  splitPath,
  tokenize,
  validateTemplate,
} from "./segments.js"

describe("Path tokenization", () => {
  test("The root and empty paths should have no segments", () => {
    expect(tokenize("")).toStrictEqual([])
    expect(tokenize("/")).toStrictEqual([])
    expect(tokenize("///")).toStrictEqual([])
  })

  test("Segments should be classified", () => {
    expect(tokenize("/users/{id}/files/*rest")).toStrictEqual([
      { type: "static", text: "users" },
      { type: "param", name: "id" },
      { type: "static", text: "files" },
      { type: "wildcard", name: "rest" },
    ])
    expect(tokenize("/assets/*")).toStrictEqual([
      { type: "static", text: "assets" },
      { type: "wildcard" },
    ])
  })

  test("Leading, trailing and repeated separators should be ignored", () => {
    expect(splitPath("//a//b/")).toStrictEqual(["a", "b"])
    expect(tokenize("a/b")).toStrictEqual(tokenize("/a/b/"))
  })

  test("Tokens should carry their offset in the path", () => {
    expect(scanPath("/files/a//b/")).toStrictEqual([
      { text: "files", offset: 1 },
      { text: "a", offset: 7 },
      { text: "b", offset: 10 },
    ])
    expect(scanPath("")).toStrictEqual([])
  })

  test("Partial braces should be static", () => {
    expect(tokenize("/{id")).toStrictEqual([{ type: "static", text: "{id" }])
    expect(tokenize("/a{b}")).toStrictEqual([{ type: "static", text: "a{b}" }])
  })
})

describe("Template validation", () => {
  const validate = (path: string) => () => validateTemplate(tokenize(path), path)

  test("Valid templates should be accepted", () => {
    expect(validate("/")).not.toThrow()
    expect(validate("/users/{id}")).not.toThrow()
    expect(validate("/files/*")).not.toThrow()
    expect(validate("/files/{owner}/*path")).not.toThrow()
  })

  test("Invalid names should be rejected", () => {
    expect(validate("/users/{}")).toThrow(ConfigurationError)
    expect(validate("/users/{1d}")).toThrow(ConfigurationError)
    expect(validate("/users/{user-id}")).toThrow(ConfigurationError)
    expect(validate("/files/*a-b")).toThrow(ConfigurationError)
  })

  test("Wildcards must be the final segment", () => {
    expect(validate("/files/*/more")).toThrow(
      "Wildcard must be the final segment in /files/*/more",
    )
  })

  test("Parameter names must be unique", () => {
    expect(validate("/{id}/{id}")).toThrow(
      'Duplicate parameter name "id" in /{id}/{id}',
    )
    expect(validate("/{id}/*id")).toThrow(ConfigurationError)
  })
})

describe("Path joining", () => {
  test("Paths should be normalized", () => {
    expect(joinPaths()).toBe("/")
    expect(joinPaths("", "/")).toBe("/")
    expect(joinPaths("/api/", "/users/", "{id}")).toBe("/api/users/{id}")
    expect(joinPaths("/files", "*")).toBe("/files/*")
  })
})
