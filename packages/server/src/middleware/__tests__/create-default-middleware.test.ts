import { NullLogger } from "@featurekit/logger"
import { createDefaultMiddleware } from "../create-default-middleware"

describe("createDefaultMiddleware", () => {
  const logger = new NullLogger()

  it("includes request id, logger and request logging when enabled", () => {
    const middleware = createDefaultMiddleware(
      {
        requestId: {
          enabled: true,
          header: "x-request-id",
          fallbackToTraceparent: false,
          generate: () => "id",
        },
        requestLogging: { enabled: true, level: "info", ignorePaths: [] },
      },
      logger,
    )

    expect(middleware).toHaveLength(3)
  })

  it("always keeps the request logger", () => {
    const middleware = createDefaultMiddleware(
      { requestId: { enabled: false }, requestLogging: { enabled: false } },
      logger,
    )

    expect(middleware).toHaveLength(1)
  })
})
