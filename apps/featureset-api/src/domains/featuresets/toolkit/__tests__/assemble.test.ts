import { assembleFeatureset } from "../assemble"
import type { TimeSeries } from "../time-series"

function series(name: string): TimeSeries {
  return { name, label: null, times: [], values: [], errors: null }
}

describe("assembleFeatureset", () => {
  it("lays out one row per series", () => {
    const table = assembleFeatureset(
      [
        { mean: 1, std: null },
        { mean: 2, std: 0.5 },
      ],
      [series("a.csv"), series("b.csv")],
    )

    expect(table).toEqual({
      features: ["mean", "std"],
      rows: [
        { name: "a.csv", values: [1, null] },
        { name: "b.csv", values: [2, 0.5] },
      ],
    })
  })

  it("rejects vectors that do not match the series", () => {
    expect(() => assembleFeatureset([{ mean: 1 }], [series("a.csv"), series("b.csv")])).toThrow(
      "Got 1 feature vectors for 2 time series",
    )
  })
})
