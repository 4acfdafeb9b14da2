import { FakeClock } from "@featurekit/clock"
import { BaseError } from "@featurekit/errors"
import { NullLogger } from "@featurekit/logger"
import type { Listening } from "../../lifecycle/listen"
import { defaultCollaborators, Server } from "../server"
import { resolveOptions, type ServerOptions } from "../server-options"

describe("Server", () => {
  function setup(overrides: Partial<ServerOptions> = {}) {
    const events: string[] = []
    const close = vi.fn((cb?: (err?: Error) => void) => cb?.())

    const listen = vi.fn(
      async (): Promise<Listening> => ({
        server: { close },
        address: { host: "127.0.0.1", port: 4711 },
      }),
    )

    const options = resolveOptions({
      port: 0,
      errorHandling: {
        kind: "mappings",
        config: { mappings: { featureset_not_found: { status: 404 } } },
      },
      routes: (app) => {
        app.get("/featuresets/:id", () => {
          throw new BaseError("Featureset not found", { code: "featureset_not_found" })
        })
      },
      startHooks: [{ name: "connect", fn: async () => void events.push("connect") }],
      stopHooks: [{ name: "drain", fn: async () => void events.push("drain") }],
      ...overrides,
    })

    const server = new Server(
      { clock: new FakeClock(0), logger: new NullLogger() },
      options,
      { ...defaultCollaborators, listen },
    )

    return { server, events, listen, close }
  }

  it("builds the app once and serves routes without listening", async () => {
    const { server, listen } = setup()

    const app = server.build()
    const res = await app.request("/featuresets/5")

    expect(server.build()).toBe(app)
    expect(res.status).toBe(404)
    expect(res.headers.get("x-request-id")).toBeTruthy()
    expect(listen).not.toHaveBeenCalled()
  })

  it("reports not ready until started", async () => {
    const { server } = setup()
    const app = server.build()

    const before = await app.request("/health/ready")
    await server.start()
    const after = await app.request("/health/ready")

    expect(before.status).toBe(503)
    expect(await before.json()).toEqual({ ok: false, reason: "starting" })
    expect(after.status).toBe(200)
  })

  it("runs start hooks before listening", async () => {
    const { server, events, listen } = setup()

    const handle = await server.start()

    expect(events).toEqual(["connect"])
    expect(listen).toHaveBeenCalledOnce()
    expect(handle.address).toEqual({ host: "127.0.0.1", port: 4711 })
    expect(server.getState()).toBe("started")
    expect(server.isReady()).toBe(true)
  })

  it("refuses a second start", async () => {
    const { server } = setup()
    await server.start()

    await expect(server.start()).rejects.toMatchObject({ code: "server_already_started" })
  })

  it("does not listen when a start hook fails", async () => {
    const cause = new Error("redis unreachable")
    const { server, listen } = setup({
      startHooks: [
        {
          name: "redis.connect",
          fn: async () => {
            throw cause
          },
        },
      ],
    })

    await expect(server.start()).rejects.toMatchObject({
      code: "server_startup_failed",
      message: "Startup hooks failed: redis.connect",
      cause,
    })
    expect(listen).not.toHaveBeenCalled()
    expect(server.getState()).toBe("idle")
  })

  it("closes the listener and runs stop hooks on stop", async () => {
    const { server, events, close } = setup()
    await server.start()

    const result = await server.stop()

    expect(result).toEqual({ ok: true, failures: [], timedOut: false })
    expect(close).toHaveBeenCalledOnce()
    expect(events).toEqual(["connect", "drain"])
    expect(server.isReady()).toBe(false)
  })

  it("treats stop before start as a no-op", async () => {
    const { server, close } = setup()

    await expect(server.stop()).resolves.toEqual({ ok: true, failures: [], timedOut: false })
    expect(close).not.toHaveBeenCalled()
  })
})
