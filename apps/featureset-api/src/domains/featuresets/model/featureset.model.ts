import type { ProjectId } from "../../projects"

export type FeaturesetId = number

interface FeaturesetBase {
  id: FeaturesetId

  /** Free-form label; not unique and may be empty. */
  name: string

  projectId: ProjectId
  featuresList: string[]

  /** Custom feature code is accepted on the wire but never run. */
  customFeaturesScript: null

  /** `<bucket>/<key>` of the artifact the computation writes. */
  fileUri: string

  createdAt: Date
  updatedAt: Date
}

/** Submitted; `taskId` correlates the record with the running computation. */
export interface PendingFeatureset extends FeaturesetBase {
  status: "pending"
  taskId: string
  finishedAt: null
}

export interface CompletedFeatureset extends FeaturesetBase {
  status: "completed"
  taskId: ""
  finishedAt: Date
}

/** A failed computation deletes its record, so there is no failed state. */
export type FeaturesetRecord = PendingFeatureset | CompletedFeatureset

export type CreateFeaturesetInput = Pick<
  PendingFeatureset,
  "name" | "projectId" | "featuresList" | "fileUri" | "taskId"
>
