import { FakeClock } from "@featurekit/clock"
import {
  createCodecKeyValueStoreCasConditional,
  type KeyValueStoreCas,
  MemoryBytesKeyValueStoreCasConditional,
  MemoryCounter,
} from "@featurekit/kv"
import { createJsonCodec, type IdIndex, IdIndexStore } from "../../../../lib"
import { featuresetKey } from "../../keyspace"
import type { CreateFeaturesetInput, FeaturesetRecord } from "../../model/featureset.model"
import { FeaturesetRepository } from "../featureset-repository"

describe("FeaturesetRepository", () => {
  let clock: FakeClock
  let featuresetKv: KeyValueStoreCas<FeaturesetRecord>
  let projectIndex: IdIndexStore
  let repository: FeaturesetRepository

  const input = (projectId: number, name = "first"): CreateFeaturesetInput => ({
    name,
    projectId,
    featuresList: ["amplitude", "period"],
    fileUri: `features/${name}_featureset.json`,
    taskId: `saveFeatureset-${name}`,
  })

  beforeEach(() => {
    clock = new FakeClock(Date.parse("2026-03-01T00:00:00Z"))
    const bytesStore = new MemoryBytesKeyValueStoreCasConditional({ clock })

    featuresetKv = createCodecKeyValueStoreCasConditional<FeaturesetRecord>({
      bytesStore,
      codec: createJsonCodec(),
    })
    projectIndex = new IdIndexStore({
      indexKv: createCodecKeyValueStoreCasConditional<IdIndex>({
        bytesStore,
        codec: createJsonCodec(),
      }),
    })
    repository = new FeaturesetRepository({
      featuresetKv,
      projectIndex,
      counter: new MemoryCounter(),
    })
  })

  it("creates a pending record", async () => {
    const record = await repository.create(input(7), clock.now())

    expect(record).toEqual({
      id: 1,
      name: "first",
      projectId: 7,
      featuresList: ["amplitude", "period"],
      customFeaturesScript: null,
      fileUri: "features/first_featureset.json",
      status: "pending",
      taskId: "saveFeatureset-first",
      finishedAt: null,
      createdAt: new Date("2026-03-01T00:00:00Z"),
      updatedAt: new Date("2026-03-01T00:00:00Z"),
    })
    await expect(repository.get(1)).resolves.toEqual(record)
  })

  it("removes the record again when it cannot be indexed", async () => {
    vi.spyOn(projectIndex, "add").mockRejectedValue(new Error("index down"))

    await expect(repository.create(input(7), clock.now())).rejects.toThrow("index down")

    await expect(repository.get(1)).resolves.toBeNull()
  })

  it("keeps every record created concurrently in the listing", async () => {
    await Promise.all(["a", "b", "c"].map((name) => repository.create(input(4, name), clock.now())))

    const records = await repository.listByProjects([4])

    expect(records.map((r) => r.id)).toEqual([1, 2, 3])
  })

  it("marks a record completed", async () => {
    const record = await repository.create(input(7), clock.now())
    clock.advance(5_000)

    const res = await repository.markCompleted(record.id, clock.now())

    expect(res).toEqual({
      kind: "written",
      record: {
        ...record,
        status: "completed",
        taskId: "",
        finishedAt: new Date("2026-03-01T00:00:05Z"),
        updatedAt: new Date("2026-03-01T00:00:05Z"),
      },
    })
    await expect(repository.get(record.id)).resolves.toMatchObject({
      status: "completed",
      taskId: "",
      finishedAt: new Date("2026-03-01T00:00:05Z"),
    })
  })

  it("does not complete a missing record", async () => {
    await expect(repository.markCompleted(42, clock.now())).resolves.toEqual({
      kind: "not_found",
    })
    await expect(repository.get(42)).resolves.toBeNull()
  })

  it("does not bring back a record deleted after it was read", async () => {
    const record = await repository.create(input(7), clock.now())
    const getVersioned = featuresetKv.getVersioned.bind(featuresetKv)
    vi.spyOn(featuresetKv, "getVersioned").mockImplementationOnce(async (key) => {
      const res = await getVersioned(key)
      await repository.delete(record.id)
      return res
    })

    await expect(repository.markCompleted(record.id, clock.now())).resolves.toEqual({
      kind: "not_found",
    })

    await expect(repository.get(record.id)).resolves.toBeNull()
    await expect(repository.listByProjects([7])).resolves.toEqual([])
  })

  it("reports a conflict when the record changed after it was read", async () => {
    const record = await repository.create(input(7), clock.now())
    const getVersioned = featuresetKv.getVersioned.bind(featuresetKv)
    vi.spyOn(featuresetKv, "getVersioned").mockImplementationOnce(async (key) => {
      const res = await getVersioned(key)
      await featuresetKv.set(featuresetKey(record.id), { ...record, name: "renamed" })
      return res
    })

    await expect(repository.markCompleted(record.id, clock.now())).resolves.toEqual({
      kind: "conflict",
    })

    await expect(repository.get(record.id)).resolves.toMatchObject({
      name: "renamed",
      status: "pending",
    })
  })

  it("lists records across projects by id", async () => {
    await repository.create(input(2, "a"), clock.now())
    await repository.create(input(1, "b"), clock.now())
    await repository.create(input(3, "c"), clock.now())
    await repository.create(input(2, "d"), clock.now())

    const records = await repository.listByProjects([2, 1])

    expect(records.map((r) => r.name)).toEqual(["a", "b", "d"])
  })

  it("removes a deleted record from listings", async () => {
    const record = await repository.create(input(1), clock.now())

    await expect(repository.delete(record.id)).resolves.toBe(true)

    await expect(repository.get(record.id)).resolves.toBeNull()
    await expect(repository.listByProjects([1])).resolves.toEqual([])
  })

  it("reports a missing record on delete", async () => {
    await expect(repository.delete(42)).resolves.toBe(false)
  })
})
