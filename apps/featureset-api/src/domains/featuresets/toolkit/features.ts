import { max, mean, median, min, skew, std, sum } from "./statistics"
import type { TimeSeries } from "./time-series"

export interface FeatureDefinition {
  /** Observations the feature needs; fewer is an error. */
  minObservations: number
  compute: (series: TimeSeries) => number
}

const OVERSAMPLING = 5
const MAX_FREQUENCIES = 10_000

function weightedAverage({ values, errors }: TimeSeries): number {
  if (!errors) return mean(values)

  const weights = errors.map((e) => 1 / e ** 2)
  return sum(values.map((v, i) => v * (weights[i] ?? 0))) / sum(weights)
}

function maxSlope({ times, values }: TimeSeries): number {
  const points = times
    .map((t, i) => ({ t, v: values[i] ?? Number.NaN }))
    .sort((a, b) => a.t - b.t)

  const slopes: number[] = []

  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1]
    const curr = points[i]
    if (!prev || !curr || curr.t === prev.t) continue

    slopes.push(Math.abs((curr.v - prev.v) / (curr.t - prev.t)))
  }

  return slopes.length > 0 ? max(slopes) : Number.NaN
}

/**
 * Lomb-Scargle periodogram over an evenly spaced frequency grid from
 * `1 / span` up to the pseudo-Nyquist frequency `n / (2 * span)`.
 */
function period({ times, values }: TimeSeries): number {
  const span = max(times) - min(times)
  if (!(span > 0)) return Number.NaN

  const fMin = 1 / span
  const fMax = times.length / (2 * span)
  const df = 1 / (OVERSAMPLING * span)
  const steps = Math.min(MAX_FREQUENCIES, Math.floor((fMax - fMin) / df) + 1)

  const m = mean(values)
  const centered = values.map((v) => v - m)

  let bestPower = Number.NEGATIVE_INFINITY
  let bestFrequency = Number.NaN

  for (let k = 0; k < steps; k++) {
    const frequency = fMin + k * df
    const w = 2 * Math.PI * frequency

    let sin2 = 0
    let cos2 = 0
    for (const t of times) {
      sin2 += Math.sin(2 * w * t)
      cos2 += Math.cos(2 * w * t)
    }
    const tau = Math.atan2(sin2, cos2) / (2 * w)

    let yc = 0
    let ys = 0
    let cc = 0
    let ss = 0
    for (const [i, t] of times.entries()) {
      const y = centered[i] ?? 0
      const c = Math.cos(w * (t - tau))
      const s = Math.sin(w * (t - tau))
      yc += y * c
      ys += y * s
      cc += c * c
      ss += s * s
    }

    const power = (cc > 0 ? (yc * yc) / cc : 0) + (ss > 0 ? (ys * ys) / ss : 0)

    if (power > bestPower) {
      bestPower = power
      bestFrequency = frequency
    }
  }

  return 1 / bestFrequency
}

export const featureDefinitions: Readonly<Record<string, FeatureDefinition>> = {
  amplitude: {
    minObservations: 1,
    compute: ({ values }) => (max(values) - min(values)) / 2,
  },
  maximum: { minObservations: 1, compute: ({ values }) => max(values) },
  minimum: { minObservations: 1, compute: ({ values }) => min(values) },
  mean: { minObservations: 1, compute: ({ values }) => mean(values) },
  median: { minObservations: 1, compute: ({ values }) => median(values) },
  std: { minObservations: 1, compute: ({ values }) => std(values) },
  skew: { minObservations: 1, compute: ({ values }) => skew(values) },
  weighted_average: { minObservations: 1, compute: weightedAverage },
  n_epochs: { minObservations: 1, compute: ({ values }) => values.length },
  total_time: { minObservations: 1, compute: ({ times }) => max(times) - min(times) },
  percent_beyond_1_std: {
    minObservations: 1,
    compute: (series) => {
      const center = weightedAverage(series)
      const spread = std(series.values)
      const beyond = series.values.filter((v) => Math.abs(v - center) > spread)

      return beyond.length / series.values.length
    },
  },
  median_absolute_deviation: {
    minObservations: 1,
    compute: ({ values }) => {
      const center = median(values)
      return median(values.map((v) => Math.abs(v - center)))
    },
  },
  max_slope: { minObservations: 2, compute: maxSlope },
  period: { minObservations: 3, compute: period },
}
