import type { ImputeStrategy } from "../../../app/config"
import type { FeatureTable } from "../model/feature-table.model"
import { max, mean, median } from "./statistics"

export type ImputeOptions = {
  strategy: ImputeStrategy

  /** Values with a larger magnitude are treated as missing. */
  maxValue: number
}

/**
 * Returns a new table with every missing value replaced by its column's fill
 * value. The input table is left untouched.
 *
 * - `constant`: `-2 * max(|observed|)` of the column.
 * - `mean` and `median`: the statistic of the observed values.
 *
 * A column without observed values fills with 0.
 */
export function imputeFeatureset(table: FeatureTable, options: ImputeOptions): FeatureTable {
  const fills = table.features.map((_, column) =>
    fillValue(observedValues(table, column, options.maxValue), options.strategy),
  )

  return {
    features: [...table.features],
    rows: table.rows.map((row) => ({
      name: row.name,
      values: row.values.map((value, column) =>
        value !== null && isObserved(value, options.maxValue) ? value : (fills[column] ?? 0),
      ),
    })),
  }
}

function observedValues(table: FeatureTable, column: number, maxValue: number): number[] {
  const values: number[] = []

  for (const row of table.rows) {
    const value = row.values[column]
    if (value !== undefined && value !== null && isObserved(value, maxValue)) values.push(value)
  }

  return values
}

function isObserved(value: number, maxValue: number): boolean {
  return Number.isFinite(value) && Math.abs(value) <= maxValue
}

function fillValue(observed: number[], strategy: ImputeStrategy): number {
  if (observed.length === 0) return 0

  switch (strategy) {
    case "constant": {
      const largest = max(observed.map(Math.abs))
      return largest === 0 ? 0 : -2 * largest
    }
    case "mean":
      return mean(observed)
    case "median":
      return median(observed)
  }
}
