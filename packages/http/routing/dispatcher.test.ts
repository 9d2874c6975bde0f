import { z } from "zod"
import { DefaultFieldBinder, defineFields } from "../fields.js"
import { HttpMethod, HttpStatusCode, type HttpHandler } from "../index.js"
import {
  echoParameters,
  named,
  readJson,
  readText,
  testRequest,
} from "../testUtils.js"
import { jsonContents, textContents } from "../utils.js"
import { Dispatcher, type LookupResult } from "./dispatcher.js"
import { Router } from "./router.js"

function routeName(result: LookupResult): string {
  return result.type === "match"
    ? `${result.route.method} ${result.route.fullPath}`
    : result.type
}

describe("Route lookup", () => {
  const router = new Router()
  router.get("/", named("root"))
  router.get("/users", named("users"))
  router.post("/users", named("create"))
  router.get("/users/{id}", named("user"))
  router.get("/users/me", named("me"))
  router.get("/files/*rest", named("files"))
  router.get("/static/*", named("static"))
  router.get("/teams/{team}/members/{member}", named("member"))

  const dispatcher = new Dispatcher(router)

  test("Static routes should resolve exactly", () => {
    expect(routeName(dispatcher.lookup({ method: HttpMethod.GET, path: "/" }))).toBe(
      "GET /",
    )
    expect(
      routeName(dispatcher.lookup({ method: HttpMethod.GET, path: "/users" })),
    ).toBe("GET /users")
    expect(
      routeName(dispatcher.lookup({ method: HttpMethod.GET, path: "//users/" })),
    ).toBe("GET /users")
  })

  test("Parameters should be captured in order and by name", () => {
    const result = dispatcher.lookup({ method: HttpMethod.GET, path: "/users/42" })
    expect(result.type).toBe("match")
    if (result.type === "match") {
      expect(result.route.fullPath).toBe("/users/{id}")
      expect(result.values).toStrictEqual(["42"])
      expect(result.parameters.get("id")).toBe("42")
    }

    const nested = dispatcher.lookup({
      method: HttpMethod.GET,
      path: "/teams/red/members/ann",
    })
    expect(nested.type === "match" ? nested.values : []).toStrictEqual([
      "red",
      "ann",
    ])
  })

  test("Static children should win over parameters", () => {
    const result = dispatcher.lookup({ method: HttpMethod.GET, path: "/users/me" })
    expect(routeName(result)).toBe("GET /users/me")
    expect(result.type === "match" ? result.values : undefined).toStrictEqual([])
  })

  test("Shorter and longer paths should miss", () => {
    expect(
      dispatcher.lookup({ method: HttpMethod.GET, path: "/users/42/extra" }),
    ).toStrictEqual({ type: "miss" })
    expect(
      dispatcher.lookup({ method: HttpMethod.GET, path: "/teams/red" }),
    ).toStrictEqual({ type: "miss" })
    expect(
      dispatcher.lookup({ method: HttpMethod.GET, path: "/unknown" }),
    ).toStrictEqual({ type: "miss" })
  })

  test("Unbound methods should report the allowed methods", () => {
    expect(
      dispatcher.lookup({ method: HttpMethod.PUT, path: "/users" }),
    ).toStrictEqual({
      type: "mismatch",
      allowed: [HttpMethod.GET, HttpMethod.POST],
    })
  })

  test("Wildcards should capture the remainder", () => {
    const result = dispatcher.lookup({
      method: HttpMethod.GET,
      path: "/files/a/b/c",
    })
    expect(routeName(result)).toBe("GET /files/*rest")
    if (result.type === "match") {
      expect(result.values).toStrictEqual(["a/b/c"])
      expect(result.parameters.get("rest")).toBe("a/b/c")
    }
  })

  test("Wildcards should match an empty remainder", () => {
    const result = dispatcher.lookup({ method: HttpMethod.GET, path: "/files" })
    expect(routeName(result)).toBe("GET /files/*rest")
    if (result.type === "match") {
      expect(result.values).toStrictEqual([""])
      expect(result.parameters.get("rest")).toBe("")
    }
  })

  test("Wildcards should match an empty remainder after a trailing slash", () => {
    const result = dispatcher.lookup({ method: HttpMethod.GET, path: "/files/" })
    expect(routeName(result)).toBe("GET /files/*rest")
    expect(result.type === "match" ? result.values : undefined).toStrictEqual([
      "",
    ])
  })

  test("Wildcards should keep the remainder as written", () => {
    const result = dispatcher.lookup({
      method: HttpMethod.GET,
      path: "/files/a//b/",
    })
    expect(result.type === "match" ? result.values : undefined).toStrictEqual([
      "a//b/",
    ])
    expect(
      result.type === "match" ? result.parameters.get("rest") : undefined,
    ).toBe("a//b/")
  })

  test("Unnamed wildcards should be keyed by *", () => {
    const result = dispatcher.lookup({
      method: HttpMethod.GET,
      path: "/static/css/site.css",
    })
    expect(result.type === "match" ? result.parameters.get("*") : undefined).toBe(
      "css/site.css",
    )
  })

  test("Identical lookups should return identical results", () => {
    const request = { method: HttpMethod.GET, path: "/users/7" }
    const first = dispatcher.lookup(request)
    const second = dispatcher.lookup(request)

    expect(second).toStrictEqual(first)
    expect(second).not.toBe(first)
  })

  test("The dispatcher should freeze the router", () => {
    expect(router.frozen).toBe(true)
  })
})

describe("Lookup without backtracking", () => {
  test("A static prefix should not fall back to a parameter", () => {
    const router = new Router()
    router.get("/a/b/c", named("static"))
    router.get("/a/{x}/d", named("param"))
    const dispatcher = new Dispatcher(router)

    expect(
      dispatcher.lookup({ method: HttpMethod.GET, path: "/a/b/d" }),
    ).toStrictEqual({ type: "miss" })
    expect(
      routeName(dispatcher.lookup({ method: HttpMethod.GET, path: "/a/z/d" })),
    ).toBe("GET /a/{x}/d")
  })

  test("Nodes with routes should not match an empty wildcard", () => {
    const router = new Router()
    router.get("/files", named("list"))
    router.get("/files/*", named("file"))
    const dispatcher = new Dispatcher(router)

    expect(
      routeName(dispatcher.lookup({ method: HttpMethod.GET, path: "/files" })),
    ).toBe("GET /files")
    expect(
      dispatcher.lookup({ method: HttpMethod.POST, path: "/files" }),
    ).toStrictEqual({ type: "mismatch", allowed: [HttpMethod.GET] })
  })
})

describe("Request handling", () => {
  test("Mounted routes should be served beneath the prefix", async () => {
    const app = new Router()
    const api = new Router()
    api.get("/items/{id}", echoParameters)
    app.mount("/api", api)
    const dispatcher = new Dispatcher(app)

    const response = await dispatcher.handle(
      testRequest(HttpMethod.GET, "/api/items/9"),
    )
    expect(response.status.code).toBe(HttpStatusCode.OK)
    expect(await readJson(response)).toStrictEqual({ id: "9" })

    const missing = await dispatcher.handle(testRequest(HttpMethod.GET, "/items/9"))
    expect(missing.status.code).toBe(HttpStatusCode.NOT_FOUND)
  })

  test("Misses should produce 404 and 405 responses", async () => {
    const router = new Router()
    router.get("/users", named("list"))
    router.post("/users", named("create"))
    const dispatcher = new Dispatcher(router)

    const notFound = await dispatcher.handle(testRequest(HttpMethod.GET, "/nope"))
    expect(notFound.status.code).toBe(HttpStatusCode.NOT_FOUND)
    expect(await readJson(notFound)).toStrictEqual({ error: "Not Found" })

    const notAllowed = await dispatcher.handle(
      testRequest(HttpMethod.PUT, "/users"),
    )
    expect(notAllowed.status.code).toBe(HttpStatusCode.METHOD_NOT_ALLOWED)
    expect(notAllowed.headers.get("allow")).toBe("GET, POST")
    expect(await readJson(notAllowed)).toStrictEqual({
      error: "Method Not Allowed",
    })
  })

  test("Error bodies should follow the error configuration", async () => {
    const router = new Router()
    const dispatcher = new Dispatcher(router, {
      errorConfig: { errorKey: "detail", useJsonResponse: false },
    })

    const response = await dispatcher.handle(testRequest(HttpMethod.GET, "/"))
    expect(response.status.code).toBe(HttpStatusCode.NOT_FOUND)
    expect(response.headers.get("content-type")).toBe("text/plain;charset=utf-8")
    expect(await readText(response)).toBe("Not Found")
  })

  test("Binding failures should produce a 400 with the binder message", async () => {
    const router = new Router()
    const handler = jest.fn(() => textContents("ok"))
    router.get(
      "/users/{id}",
      defineFields({ id: z.coerce.number().int() }, { id: "path" }),
      handler,
    )
    const dispatcher = new Dispatcher(router)

    const response = await dispatcher.handle(
      testRequest(HttpMethod.GET, "/users/abc"),
    )
    expect(response.status.code).toBe(HttpStatusCode.BAD_REQUEST)
    expect(await readJson(response)).toStrictEqual({
      error: "id: Expected number, received nan",
    })
    expect(handler).not.toHaveBeenCalled()
  })

  test("Bound input should reach the handler", async () => {
    const router = new Router()
    router.get(
      "/users/{id}",
      defineFields(
        { id: z.coerce.number().int(), verbose: z.string().optional() },
        { id: "path", verbose: "query" },
      ),
      ({ input }) => jsonContents({ id: input.id, verbose: input.verbose ?? null }),
    )
    const dispatcher = new Dispatcher(router)

    const response = await dispatcher.handle(
      testRequest(HttpMethod.GET, "/users/12?verbose=yes"),
    )
    expect(await readJson(response)).toStrictEqual({ id: 12, verbose: "yes" })
  })

  test("The binder should run once per request", async () => {
    const router = new Router()
    router.get(
      "/users/{id}",
      defineFields({ id: z.string() }, { id: "path" }),
      ({ input }) => textContents(input.id),
    )
    const binder = new DefaultFieldBinder()
    const bind = jest.spyOn(binder, "bind")
    const dispatcher = new Dispatcher(router, { binder })

    const response = await dispatcher.handle(testRequest(HttpMethod.GET, "/users/1"))
    expect(await readText(response)).toBe("1")
    expect(bind).toHaveBeenCalledTimes(1)
    expect(bind.mock.calls[0][1]).toStrictEqual(["1"])
  })

  test("The binder should run for routes without fields", async () => {
    const router = new Router()
    router.get("/x", named("x"))
    const binder = new DefaultFieldBinder()
    const bind = jest.spyOn(binder, "bind")
    const dispatcher = new Dispatcher(router, { binder })

    const response = await dispatcher.handle(testRequest(HttpMethod.GET, "/x"))
    expect(await readText(response)).toBe("x")
    expect(bind).toHaveBeenCalledTimes(1)
    expect(bind.mock.calls[0][0].fields.descriptors).toStrictEqual([])
    expect(await bind.mock.results[0].value).toStrictEqual({})
  })

  test("Middleware should be composed once when the tree is frozen", async () => {
    let created = 0
    let served = 0

    const router = new Router()
    router.use((next) => {
      created++
      return (request, abort) => {
        served++
        return next(request, abort)
      }
    })
    router.get("/x", named("x"))
    const dispatcher = new Dispatcher(router)
    expect(created).toBe(1)

    for (let n = 0; n < 3; ++n) {
      await dispatcher.handle(testRequest(HttpMethod.GET, "/x"))
    }

    expect(created).toBe(1)
    expect(served).toBe(3)
  })

  test("Bound input should survive asynchronous middleware", async () => {
    const router = new Router()
    router.use((next) => async (request, abort) => {
      await new Promise((resolve) => setImmediate(resolve))
      return next(request, abort)
    })
    router.get(
      "/users/{id}",
      defineFields({ id: z.string() }, { id: "path" }),
      ({ input }) => textContents(input.id),
    )
    const dispatcher = new Dispatcher(router)

    const [first, second] = await Promise.all([
      dispatcher.handle(testRequest(HttpMethod.GET, "/users/1")),
      dispatcher.handle(testRequest(HttpMethod.GET, "/users/2")),
    ])
    expect(await readText(first)).toBe("1")
    expect(await readText(second)).toBe("2")
  })

  test("Middleware should run from the root inwards", async () => {
    const calls: string[] = []
    const trace =
      (name: string) =>
      (next: HttpHandler): HttpHandler =>
      async (request, abort) => {
        calls.push(`${name}:before`)
        const response = await next(request, abort)
        calls.push(`${name}:after`)
        return response
      }

    const app = new Router()
    const api = new Router()
    app.use(trace("a1"))
    app.use(trace("a2"))
    api.use(trace("b1"))
    api.get("/ping", () => {
      calls.push("handler")
      return textContents("pong")
    })
    app.get("/outside", named("outside"))
    app.mount("/api", api)
    const dispatcher = new Dispatcher(app)

    await dispatcher.handle(testRequest(HttpMethod.GET, "/api/ping"))
    expect(calls).toStrictEqual([
      "a1:before",
      "a2:before",
      "b1:before",
      "handler",
      "b1:after",
      "a2:after",
      "a1:after",
    ])

    calls.length = 0
    await dispatcher.handle(testRequest(HttpMethod.GET, "/outside"))
    expect(calls).toStrictEqual([
      "a1:before",
      "a2:before",
      "a2:after",
      "a1:after",
    ])
  })

  test("Handler errors should not be recovered", async () => {
    const router = new Router()
    router.get("/boom", () => {
      throw new Error("boom")
    })
    const dispatcher = new Dispatcher(router)

    await expect(
      dispatcher.handle(testRequest(HttpMethod.GET, "/boom")),
    ).rejects.toThrow("boom")
  })

  test("The abort signal should reach the handler", async () => {
    const router = new Router()
    router.get("/slow", (_, abort) =>
      textContents(abort?.aborted ? "aborted" : "running"),
    )
    const dispatcher = new Dispatcher(router)
    const controller = new AbortController()
    controller.abort()

    const response = await dispatcher.handle(
      testRequest(HttpMethod.GET, "/slow"),
      controller.signal,
    )
    expect(await readText(response)).toBe("aborted")
  })
})
