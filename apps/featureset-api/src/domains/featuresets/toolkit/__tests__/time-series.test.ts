import { FakeClock } from "@featurekit/clock"
import { MemoryStorage } from "@featurekit/storage"
import { loadTimeSeries, parseTimeSeries } from "../time-series"

const meta = { name: "a.csv", label: null }

describe("parseTimeSeries", () => {
  it("skips a header row", () => {
    expect(parseTimeSeries("time,value\n1,2\n2,4\n", meta)).toEqual({
      name: "a.csv",
      label: null,
      times: [1, 2],
      values: [2, 4],
      errors: null,
    })
  })

  it("reads an error column and ignores comments and blank lines", () => {
    const series = parseTimeSeries("# observed 2026-03-01\n\n0,1,0.1\n1,2,0.2\n", meta)

    expect(series.times).toEqual([0, 1])
    expect(series.values).toEqual([1, 2])
    expect(series.errors).toEqual([0.1, 0.2])
  })

  it("returns an empty series for a header-only file", () => {
    expect(parseTimeSeries("time,value\n", meta).values).toEqual([])
  })

  it.each([
    ["1,2\n1,x\n", "a.csv line 2: expected numeric fields"],
    ["1,2,3,4\n", "a.csv line 1: expected 2 or 3 columns"],
    ["1,2\n1,2,3\n", "a.csv line 2: expected 2 columns, got 3"],
  ])("rejects %j", (text, message) => {
    expect(() => parseTimeSeries(text, meta)).toThrow(message)
  })
})

describe("loadTimeSeries", () => {
  const ref = { bucket: "datasets", key: "upload-1/a.csv" }
  let storage: MemoryStorage

  beforeEach(() => {
    storage = new MemoryStorage({ clock: new FakeClock(0) })
  })

  it("takes the label from the object metadata", async () => {
    await storage.put(ref, Buffer.from("0,1\n1,3\n"), { metadata: { label: "RR Lyrae" } })

    const series = await loadTimeSeries({ name: "a.csv", ref }, storage)

    expect(series.label).toBe("RR Lyrae")
    expect(series.values).toEqual([1, 3])
  })

  it("fails for a missing object", async () => {
    await expect(loadTimeSeries({ name: "a.csv", ref }, storage)).rejects.toMatchObject({
      code: "time_series_not_found",
      message: "Time series file a.csv not found",
    })
  })
})
