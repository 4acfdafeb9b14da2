import type { Logger } from "@featurekit/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { requestLoggingMiddleware } from "../request-logging"

describe("requestLoggingMiddleware", () => {
  let logger: Mock<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  function app(level: "info" | "debug" = "info") {
    const app = new Hono()

    app.use("*", requestLoggingMiddleware({ enabled: true, level, ignorePaths: ["/health"] }, logger))
    app.get("/featuresets/:id", (c) => c.json({ id: c.req.param("id") }, 200))
    app.get("/broken", (c) => c.text("down", 503))
    app.get("/health/live", (c) => c.text("ok"))

    return app
  }

  it("logs a completed request at the configured level", async () => {
    await app("debug").request("/featuresets/3", { headers: { "user-agent": "curl/8" } })

    expect(logger.debug).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({
        method: "GET",
        path: "/featuresets/3",
        status: 200,
        userAgent: "curl/8",
      }),
    )
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("logs 5xx responses at error", async () => {
    await app().request("/broken")

    expect(logger.error).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ path: "/broken", status: 503 }),
    )
  })

  it("skips ignored paths and their children", async () => {
    await app().request("/health/live")

    expect(logger.info).not.toHaveBeenCalled()
    expect(logger.error).not.toHaveBeenCalled()
  })
})
