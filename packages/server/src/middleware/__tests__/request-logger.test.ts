import type { Logger } from "@featurekit/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import { requestLoggerMiddleware } from "../request-logger"

describe("requestLoggerMiddleware", () => {
  it("binds a child logger carrying the request id", async () => {
    const base = mock<Logger>()
    const child = mock<Logger>()
    base.child.mockReturnValue(child)

    const app = new Hono()
    app.use("*", async (c, next) => {
      c.set("requestId", "req-7")
      await next()
    })
    app.use("*", requestLoggerMiddleware(base))
    app.get("/", (c) => {
      c.get("logger").info("inside")
      return c.body(null, 204)
    })

    await app.request("/")

    expect(base.child).toHaveBeenCalledWith({ requestId: "req-7" })
    expect(child.info).toHaveBeenCalledWith("inside")
  })

  it("uses the base logger when there is no request id", async () => {
    const base = mock<Logger>()

    const app = new Hono()
    app.use("*", requestLoggerMiddleware(base))
    app.get("/", (c) => {
      c.get("logger").info("inside")
      return c.body(null, 204)
    })

    await app.request("/")

    expect(base.child).not.toHaveBeenCalled()
    expect(base.info).toHaveBeenCalledWith("inside")
  })
})
