import type { Application } from "@featurekit/server"
import { IdIndexError } from "../../../../lib"
import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import type { Project } from "../../model/project.model"

describe("Project API", () => {
  let harness: TestHarness
  let app: Application

  beforeEach(async () => {
    harness = await createTestHarness()
    await harness.lifecycle.start()
    app = harness.app
  })

  afterEach(async () => {
    await harness.lifecycle.stop()
  })

  type ApiResponse<T> = {
    status: number
    body: T
  }

  const call = async <T = Record<string, unknown>>(
    method: string,
    path: string,
    opts: { principal?: string; body?: unknown } = {},
  ): Promise<ApiResponse<T>> => {
    const res = await app.request(`/api/v1${path}`, {
      method,
      headers: { "Content-Type": "application/json", "x-user": opts.principal ?? "alice" },
      ...(opts.body !== undefined && { body: JSON.stringify(opts.body) }),
    })

    return { status: res.status, body: (await res.json()) as T }
  }

  describe("POST /projects", () => {
    it("lists every project created concurrently", async () => {
      const created = await Promise.all(
        ["Cepheids", "Eclipsing binaries"].map((name) =>
          call("POST", "/projects", { body: { name } }),
        ),
      )
      expect(created.map((res) => res.status)).toEqual([201, 201])

      const { status, body } = await call<{ data: Project[] }>("GET", "/projects")

      expect(status).toBe(200)
      expect(body.data.map((project) => project.id)).toEqual([1, 2])
    })

    it("answers 503 when the owner's project list keeps changing", async () => {
      vi.spyOn(harness.ctx.services.domains.projects.projects, "create").mockRejectedValue(
        IdIndexError.contention("projects:owner-index:alice", 50),
      )

      const { status, body } = await call("POST", "/projects", { body: { name: "Cepheids" } })

      expect(status).toBe(503)
      expect(body).toMatchObject({
        error: {
          status: 503,
          code: "index_contention",
          message: "Too many concurrent changes, try again",
        },
      })
    })
  })

  describe("GET /projects", () => {
    it("lists only the principal's projects", async () => {
      await call("POST", "/projects", { body: { name: "Cepheids" } })
      await call("POST", "/projects", { principal: "bob", body: { name: "Novae" } })

      const { body } = await call<{ data: Project[] }>("GET", "/projects")

      expect(body.data.map((project) => project.name)).toEqual(["Cepheids"])
    })
  })
})
