export function sum(xs: readonly number[]): number {
  return xs.reduce((total, x) => total + x, 0)
}

/** NaN for an empty input. */
export function mean(xs: readonly number[]): number {
  return sum(xs) / xs.length
}

/** NaN for an empty input. */
export function median(xs: readonly number[]): number {
  if (xs.length === 0) return Number.NaN

  const sorted = [...xs].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  const upper = sorted[mid] ?? Number.NaN

  if (sorted.length % 2 === 1) return upper

  return ((sorted[mid - 1] ?? Number.NaN) + upper) / 2
}

/** Population standard deviation. */
export function std(xs: readonly number[]): number {
  const m = mean(xs)
  return Math.sqrt(mean(xs.map((x) => (x - m) ** 2)))
}

/** Biased sample skewness, `m3 / m2^1.5`. NaN when the values are constant. */
export function skew(xs: readonly number[]): number {
  const m = mean(xs)
  const m2 = mean(xs.map((x) => (x - m) ** 2))
  const m3 = mean(xs.map((x) => (x - m) ** 3))

  return m2 === 0 ? Number.NaN : m3 / m2 ** 1.5
}

/** -Infinity for an empty input. */
export function max(xs: readonly number[]): number {
  return xs.reduce((best, x) => (x > best ? x : best), Number.NEGATIVE_INFINITY)
}

/** Infinity for an empty input. */
export function min(xs: readonly number[]): number {
  return xs.reduce((best, x) => (x < best ? x : best), Number.POSITIVE_INFINITY)
}
