import { Hono } from "hono"
import { requestIdMiddleware, traceIdFromTraceparent } from "../request-id"

const TRACEPARENT = "00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01"

describe("traceIdFromTraceparent", () => {
  it("extracts the trace id", () => {
    expect(traceIdFromTraceparent(TRACEPARENT)).toBe("4bf92f3577b34da6a3ce929d0e0e4736")
  })

  it.each([
    "00-00000000000000000000000000000000-00f067aa0ba902b7-01",
    "00-not-a-trace-01",
    "garbage",
  ])("rejects %s", (value) => {
    expect(traceIdFromTraceparent(value)).toBeNull()
  })
})

describe("requestIdMiddleware", () => {
  function app(fallbackToTraceparent = false) {
    const app = new Hono()

    app.use(
      "*",
      requestIdMiddleware({
        enabled: true,
        header: "x-request-id",
        fallbackToTraceparent,
        generate: () => "generated-1",
      }),
    )
    app.get("/", (c) => c.text(c.get("requestId")))
    app.get("/own", (c) => {
      c.header("x-request-id", "set-by-handler")
      return c.text(c.get("requestId"))
    })

    return app
  }

  it("reuses the incoming header and echoes it", async () => {
    const res = await app().request("/", { headers: { "X-Request-Id": "abc-123" } })

    expect(await res.text()).toBe("abc-123")
    expect(res.headers.get("x-request-id")).toBe("abc-123")
  })

  it("generates an id when none is sent", async () => {
    const res = await app().request("/")

    expect(await res.text()).toBe("generated-1")
    expect(res.headers.get("x-request-id")).toBe("generated-1")
  })

  it("falls back to traceparent only when enabled", async () => {
    const headers = { traceparent: TRACEPARENT }

    const withFallback = await app(true).request("/", { headers })
    const without = await app(false).request("/", { headers })

    expect(await withFallback.text()).toBe("4bf92f3577b34da6a3ce929d0e0e4736")
    expect(await without.text()).toBe("generated-1")
  })

  it("leaves a response header the handler already set", async () => {
    const res = await app().request("/own")

    expect(res.headers.get("x-request-id")).toBe("set-by-handler")
  })
})
