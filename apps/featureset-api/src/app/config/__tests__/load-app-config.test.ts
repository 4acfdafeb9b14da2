import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { loadAppConfig } from "../load-app-config"

describe("loadAppConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "featureset-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("applies defaults", async () => {
    const config = await loadAppConfig({ NODE_ENV: "test" }, undefined, cwd)

    expect(config.server.port).toBe(4700)
    expect(config.auth.principalHeader).toBe("x-user")
    expect(config.store.driver).toBe("memory")
    expect(config.featurization).toEqual({
      concurrency: 4,
      impute: { strategy: "constant", maxValue: 1e20 },
    })
    expect(config.events.heartbeatMs).toBe(15_000)
  })

  it("reads the environment", async () => {
    const config = await loadAppConfig(
      {
        NODE_ENV: "test",
        SERVER_PORT: "5000",
        LOG_PRETTY: "true",
        STORE_DRIVER: "redis",
        WORKER_POOL_CONCURRENCY: "8",
        IMPUTE_STRATEGY: "median",
      },
      undefined,
      cwd,
    )

    expect(config.server.port).toBe(5000)
    expect(config.logging.prettify).toBe(true)
    expect(config.store.driver).toBe("redis")
    expect(config.featurization.concurrency).toBe(8)
    expect(config.featurization.impute.strategy).toBe("median")
  })

  it("lets the environment win over the dotenv file", async () => {
    await fs.writeFile(path.join(cwd, ".env.test"), "SERVICE_NAME=from-file\nSERVER_PORT=4800\n")

    const config = await loadAppConfig({ NODE_ENV: "test", SERVER_PORT: "4900" }, undefined, cwd)

    expect(config.logging.serviceName).toBe("from-file")
    expect(config.server.port).toBe(4900)
  })

  it("applies overrides last", async () => {
    const config = await loadAppConfig(
      { NODE_ENV: "test" },
      { featurization: { impute: { strategy: "mean" } } },
      cwd,
    )

    expect(config.featurization.impute).toEqual({ strategy: "mean", maxValue: 1e20 })
  })

  it.each([
    ["IMPUTE_STRATEGY", "mode"],
    ["WORKER_POOL_CONCURRENCY", "0"],
    ["WORKER_POOL_CONCURRENCY", "1.5"],
  ])("rejects %s=%s", async (name, value) => {
    await expect(loadAppConfig({ NODE_ENV: "test", [name]: value }, undefined, cwd)).rejects.toThrow(
      "Configuration validation failed",
    )
  })
})
