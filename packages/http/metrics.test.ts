import { createNoopMeter, metrics } from "@opentelemetry/api"
import {
  enableFrameworkMetrics,
  getFrameworkMeter,
} from "@trellis/core/observability/metrics.js"
import { HttpMethod } from "./index.js"
import { getRouteMetrics } from "./metrics.js"
import { Dispatcher } from "./routing/dispatcher.js"
import { Router } from "./routing/router.js"
import { named, testRequest } from "./testUtils.js"

describe("Route metrics", () => {
  test("Enabling metrics should rebind the routing instruments", async () => {
    const meter = createNoopMeter()
    const add = jest.fn()
    const record = jest.fn()
    jest.spyOn(meter, "createCounter").mockReturnValue({ add })
    jest.spyOn(meter, "createHistogram").mockReturnValue({ record })
    metrics.setGlobalMeterProvider({ getMeter: () => meter })

    const router = new Router()
    router.get("/ok", named("ok"))
    const dispatcher = new Dispatcher(router)

    await dispatcher.handle(testRequest(HttpMethod.GET, "/ok"))
    expect(add).not.toHaveBeenCalled()

    const before = getRouteMetrics()
    enableFrameworkMetrics()
    expect(getFrameworkMeter()).toBe(meter)
    expect(getRouteMetrics()).not.toBe(before)
    expect(getRouteMetrics()).toBe(getRouteMetrics())

    await dispatcher.handle(testRequest(HttpMethod.GET, "/ok"))
    await dispatcher.handle(testRequest(HttpMethod.GET, "/missing"))

    expect(add.mock.calls).toStrictEqual([
      [1, { status: "200", template: "/ok", method: HttpMethod.GET }],
      [1, { reason: "not_found" }],
    ])
    expect(record).toHaveBeenCalledTimes(1)
    expect(record).toHaveBeenCalledWith(expect.any(Number), {
      template: "/ok",
      method: HttpMethod.GET,
    })
  })
})
