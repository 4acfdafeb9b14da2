import { FakeClock } from "@featurekit/clock"
import { sequenceIds } from "@featurekit/id"
import { NullLogger } from "@featurekit/logger"
import { MemoryStorage, readText } from "@featurekit/storage"
import { LocalWorkerPool } from "@featurekit/taskgraph"
import type { DatasetFile } from "../../../projects"
import { FeaturizationPipeline } from "../featurization-pipeline"

describe("FeaturizationPipeline", () => {
  const artifact = { bucket: "features", key: "fs-1_featureset.json" }

  let storage: MemoryStorage
  let pool: LocalWorkerPool
  let pipeline: FeaturizationPipeline

  async function upload(name: string, content: string, label?: string): Promise<DatasetFile> {
    const ref = { bucket: "datasets", key: `upload-1/${name}` }
    await storage.put(ref, Buffer.from(content), {
      ...(label !== undefined && { metadata: { label } }),
    })

    return { name, ref }
  }

  beforeEach(() => {
    const clock = new FakeClock(Date.parse("2026-03-01T00:00:00Z"))

    storage = new MemoryStorage({ clock })
    pool = new LocalWorkerPool({ logger: new NullLogger(), ids: sequenceIds("t-") }, { concurrency: 2 })
    pipeline = new FeaturizationPipeline(
      { pool, storage, clock, logger: new NullLogger() },
      { impute: { strategy: "constant", maxValue: 1e20 } },
    )
  })

  afterEach(async () => {
    await pool.close()
  })

  it("returns the save task's key before anything has run", async () => {
    const file = await upload("a.csv", "0,1\n1,3\n")

    const { future, taskId } = pipeline.submit({ files: [file], features: ["mean"], artifact })

    expect(taskId).toBe(future.key)
    expect(taskId).toMatch(/^saveFeatureset-t-\d+$/)
    expect(future.status).toBe("pending")

    await expect(future.result()).resolves.toEqual(artifact)
  })

  it("writes one imputed row per series, keeping an unusable series", async () => {
    const files = [
      await upload("a.csv", "0,1\n1,3\n2,5\n", "RR Lyrae"),
      await upload("b.csv", "time,value\n"),
      await upload("c.csv", "0,-1\n1,1\n2,2\n"),
    ]

    const { future } = pipeline.submit({ files, features: ["amplitude", "maximum"], artifact })
    await future.result()

    const object = await readText(storage, artifact)
    expect(JSON.parse(object?.text ?? "null")).toEqual({
      features: ["amplitude", "maximum"],
      rows: [
        { name: "a.csv", values: [2, 5] },
        { name: "b.csv", values: [-4, -10] },
        { name: "c.csv", values: [1.5, 2] },
      ],
      labels: ["RR Lyrae", null, null],
      createdAt: "2026-03-01T00:00:00.000Z",
    })
  })

  it("fails when a series cannot be loaded", async () => {
    const missing: DatasetFile = {
      name: "gone.csv",
      ref: { bucket: "datasets", key: "upload-1/gone.csv" },
    }

    const { future } = pipeline.submit({ files: [missing], features: ["mean"], artifact })

    await expect(future.result()).rejects.toMatchObject({ code: "time_series_not_found" })
    await expect(readText(storage, artifact)).resolves.toBeNull()
  })
})
