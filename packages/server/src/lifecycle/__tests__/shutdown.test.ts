import { FakeClock } from "@featurekit/clock"
import { NullLogger } from "@featurekit/logger"
import type { LifecycleHook } from "../lifecycle-hook"
import { type Closeable, type ShutdownContext, shutdown } from "../shutdown"

describe("shutdown", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(0)
  })

  function closingServer(order: string[], err?: Error): Closeable {
    return {
      close: (cb) => {
        order.push("server.close")
        cb?.(err)
      },
    }
  }

  function ctx(overrides: Partial<ShutdownContext>): ShutdownContext {
    return {
      server: closingServer([]),
      clock,
      logger: new NullLogger(),
      deadlineMs: 10_000,
      stopHooks: [],
      ...overrides,
    }
  }

  it("closes the server before the stop hooks run", async () => {
    const order: string[] = []
    const stopHooks: LifecycleHook[] = [
      { name: "pool.close", fn: async () => void order.push("pool.close") },
    ]

    const result = await shutdown(ctx({ server: closingServer(order), stopHooks }))

    expect(order).toEqual(["server.close", "pool.close"])
    expect(result).toEqual({ ok: true, failures: [], timedOut: false })
  })

  it("runs every stop hook even when one fails", async () => {
    const err = new Error("quit failed")
    const after = vi.fn(async () => {})

    const result = await shutdown(
      ctx({
        stopHooks: [
          {
            name: "redis.quit",
            fn: async () => {
              throw err
            },
          },
          { name: "after", fn: after },
        ],
      }),
    )

    expect(after).toHaveBeenCalledOnce()
    expect(result).toEqual({
      ok: false,
      failures: [{ hook: "redis.quit", error: err }],
      timedOut: false,
    })
  })

  it("reports a server close error as a failure", async () => {
    const err = new Error("not running")

    const result = await shutdown(ctx({ server: closingServer([], err) }))

    expect(result.failures).toEqual([{ hook: "server.close", error: err }])
  })

  it("gives up on a server that never closes once the deadline passes", async () => {
    const hook = vi.fn(async () => {})

    const result = await shutdown(
      ctx({
        server: { close: () => {} },
        deadlineMs: 20,
        stopHooks: [{ name: "hook", fn: hook }],
      }),
    )

    expect(result).toEqual({ ok: false, failures: [], timedOut: true })
    expect(hook).not.toHaveBeenCalled()
  })
})
