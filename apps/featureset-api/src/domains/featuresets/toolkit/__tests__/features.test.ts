import { featureCatalog } from "../catalog"
import { featureDefinitions } from "../features"
import type { TimeSeries } from "../time-series"

function series(values: number[], errors: number[] | null = null): TimeSeries {
  return { name: "a.csv", label: null, times: values.map((_, i) => i), values, errors }
}

function compute(feature: string, s: TimeSeries): number | undefined {
  return featureDefinitions[feature]?.compute(s)
}

describe("featureDefinitions", () => {
  it("defines every catalog feature", () => {
    for (const { name } of featureCatalog) {
      expect(featureDefinitions[name], name).toBeDefined()
    }
  })

  describe("on a linear series", () => {
    const linear = series([1, 2, 3, 4])

    it.each([
      ["amplitude", 1.5],
      ["maximum", 4],
      ["minimum", 1],
      ["mean", 2.5],
      ["median", 2.5],
      ["skew", 0],
      ["n_epochs", 4],
      ["total_time", 3],
      ["percent_beyond_1_std", 0.5],
      ["median_absolute_deviation", 1],
      ["max_slope", 1],
    ])("computes %s", (feature, expected) => {
      expect(compute(feature, linear)).toBe(expected)
    })

    it("computes the population standard deviation", () => {
      expect(compute("std", linear)).toBeCloseTo(Math.sqrt(1.25), 10)
    })
  })

  it("weights the average by inverse squared errors", () => {
    expect(compute("weighted_average", series([1, 2, 3, 4], [1, 1, 2, 2]))).toBeCloseTo(1.9, 10)
  })

  it("falls back to the plain mean without errors", () => {
    expect(compute("weighted_average", series([1, 2, 6]))).toBe(3)
  })

  it("finds the period of a sinusoid", () => {
    const times = Array.from({ length: 60 }, (_, i) => i * 0.37)
    const sinusoid: TimeSeries = {
      name: "sine.csv",
      label: null,
      times,
      values: times.map((t) => Math.sin(Math.PI * t)),
      errors: null,
    }

    expect(compute("period", sinusoid)).toBeCloseTo(2, 1)
  })

  it("has no skew for constant values", () => {
    expect(compute("skew", series([5, 5, 5]))).toBeNaN()
  })
})
