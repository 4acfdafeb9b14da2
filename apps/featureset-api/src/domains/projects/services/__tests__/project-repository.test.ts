import { FakeClock } from "@featurekit/clock"
import {
  createCodecKeyValueStore,
  createCodecKeyValueStoreCasConditional,
  MemoryBytesKeyValueStoreCasConditional,
  MemoryCounter,
} from "@featurekit/kv"
import { createJsonCodec, type IdIndex, IdIndexStore } from "../../../../lib"
import type { Project } from "../../model/project.model"
import { ProjectRepository } from "../project-repository"

describe("ProjectRepository", () => {
  let clock: FakeClock
  let ownerIndex: IdIndexStore
  let repository: ProjectRepository

  beforeEach(() => {
    clock = new FakeClock(Date.parse("2026-03-01T00:00:00Z"))
    const bytesStore = new MemoryBytesKeyValueStoreCasConditional({ clock })

    ownerIndex = new IdIndexStore({
      indexKv: createCodecKeyValueStoreCasConditional<IdIndex>({
        bytesStore,
        codec: createJsonCodec(),
      }),
    })
    repository = new ProjectRepository({
      projectKv: createCodecKeyValueStore<Project>({ bytesStore, codec: createJsonCodec() }),
      ownerIndex,
      counter: new MemoryCounter(),
    })
  })

  it("assigns increasing ids from the counter", async () => {
    const first = await repository.create({ name: "a", ownerId: "alice" }, clock.now())
    const second = await repository.create({ name: "b", ownerId: "bob" }, clock.now())

    expect(first.id).toBe(1)
    expect(second.id).toBe(2)
  })

  it("round-trips the creation time as a Date", async () => {
    const created = await repository.create({ name: "a", ownerId: "alice" }, clock.now())

    const loaded = await repository.get(created.id)

    expect(loaded).toEqual({
      id: 1,
      name: "a",
      ownerId: "alice",
      createdAt: new Date("2026-03-01T00:00:00Z"),
    })
  })

  it("returns null for an unknown id", async () => {
    await expect(repository.get(99)).resolves.toBeNull()
  })

  it("lists only the owner's projects, ordered by id", async () => {
    await repository.create({ name: "a1", ownerId: "alice" }, clock.now())
    await repository.create({ name: "b1", ownerId: "bob" }, clock.now())
    await repository.create({ name: "a2", ownerId: "alice" }, clock.now())

    const projects = await repository.listByOwner("alice")

    expect(projects.map((p) => [p.id, p.name])).toEqual([
      [1, "a1"],
      [3, "a2"],
    ])
  })

  it("lists every project created concurrently for one owner", async () => {
    await Promise.all(
      ["a1", "a2", "a3"].map((name) =>
        repository.create({ name, ownerId: "alice" }, clock.now()),
      ),
    )

    const projects = await repository.listByOwner("alice")

    expect(projects.map((p) => p.id)).toEqual([1, 2, 3])
  })

  it("removes the project again when it cannot be indexed", async () => {
    vi.spyOn(ownerIndex, "add").mockRejectedValue(new Error("index down"))

    await expect(
      repository.create({ name: "a", ownerId: "alice" }, clock.now()),
    ).rejects.toThrow("index down")

    await expect(repository.get(1)).resolves.toBeNull()
  })

  it("lists nothing for an owner without projects", async () => {
    await expect(repository.listByOwner("carol")).resolves.toEqual([])
  })
})
