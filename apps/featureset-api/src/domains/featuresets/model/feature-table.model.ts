/** Computed value per feature name; null where the value could not be computed. */
export type FeatureVector = Record<string, number | null>

export interface FeatureRow {
  /** Name of the time series the row was computed from. */
  name: string
  values: (number | null)[]
}

/** One column per feature, one row per time series. */
export interface FeatureTable {
  features: string[]
  rows: FeatureRow[]
}

/** Persisted featureset artifact. `labels[i]` belongs to `rows[i]`. */
export interface FeaturesetArtifact extends FeatureTable {
  labels: (string | null)[]
  createdAt: string
}
