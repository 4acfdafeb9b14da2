import { FakeClock } from "@featurekit/clock"
import { readAll } from "../../core/bytes"
import { describeStorageContract } from "../../ports/__tests__/storage.contract"
import { MemoryStorage } from "../memory-storage"

describeStorageContract("MemoryStorage", async () => ({
  storage: new MemoryStorage({ clock: new FakeClock() }),
}))

describe("MemoryStorage (behavior)", () => {
  it("stamps lastModified from the clock", async () => {
    const clock = new FakeClock(new Date("2026-03-01T00:00:00Z"))
    const storage = new MemoryStorage({ clock })

    await storage.put({ bucket: "b", key: "k" }, Buffer.from("x"))

    expect((await storage.head({ bucket: "b", key: "k" }))?.lastModified).toStrictEqual(
      new Date("2026-03-01T00:00:00Z"),
    )
  })

  it("stores a copy of the input", async () => {
    const storage = new MemoryStorage({ clock: new FakeClock() })
    const data = Buffer.from("abc")

    await storage.put({ bucket: "b", key: "k" }, data)
    data[0] = 0x7a

    const obj = await storage.get({ bucket: "b", key: "k" })
    if (!obj) throw new Error("expected object")

    expect((await readAll(obj.body)).toString()).toBe("abc")
  })
})
