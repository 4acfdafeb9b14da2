import type { TimeSource } from "@featurekit/clock"
import type { ObjectRef, StoragePort } from "@featurekit/storage"
import type { FeaturesetArtifact, FeatureTable } from "../model/feature-table.model"

export type SaveTarget = {
  storage: StoragePort
  ref: ObjectRef
  clock: TimeSource
}

/** Writes the table and its labels as a JSON artifact at `target.ref`. */
export async function saveFeatureset(
  table: FeatureTable,
  labels: readonly (string | null)[],
  target: SaveTarget,
): Promise<ObjectRef> {
  const artifact: FeaturesetArtifact = {
    features: table.features,
    rows: table.rows,
    labels: [...labels],
    createdAt: target.clock.now().toISOString(),
  }

  await target.storage.put(target.ref, Buffer.from(JSON.stringify(artifact), "utf8"), {
    contentType: "application/json",
  })

  return target.ref
}
