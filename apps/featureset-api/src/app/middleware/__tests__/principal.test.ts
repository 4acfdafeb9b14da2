import type { Logger } from "@featurekit/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import { principalMiddleware } from "../principal"

describe("principalMiddleware", () => {
  let base: Logger
  let app: Hono

  beforeEach(() => {
    base = mock<Logger>()

    app = new Hono()
    app.use("*", async (c, next) => {
      c.set("logger", base)
      await next()
    })
    app.use("*", principalMiddleware({ header: "x-user" }))
    app.get("/", (c) => c.text(c.get("principal")))
    app.onError((err, c) => c.text(err.message, 401))
  })

  it("exposes the principal to handlers", async () => {
    const res = await app.request("/", { headers: { "x-user": " alice " } })

    expect(await res.text()).toBe("alice")
    expect(base.child).toHaveBeenCalledWith({ principal: "alice" })
  })

  it.each<Record<string, string>>([{}, { "x-user": "   " }])("rejects a request with headers %j", async (headers) => {
    const res = await app.request("/", { headers })

    expect(res.status).toBe(401)
    expect(await res.text()).toBe("Missing x-user header")
  })
})
