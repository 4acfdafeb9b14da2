import type { ObjectRef } from "@featurekit/storage"

export type ProjectId = number
export type DatasetId = number

export interface Project {
  id: ProjectId
  name: string

  /** Principal that created the project; the only one who can see it. */
  ownerId: string

  createdAt: Date
}

export interface DatasetFile {
  /** Original file name, unique within the dataset. */
  name: string
  ref: ObjectRef
}

export interface Dataset {
  id: DatasetId
  projectId: ProjectId
  name: string
  files: DatasetFile[]
  createdAt: Date
}

export type CreateProjectInput = Pick<Project, "name" | "ownerId">

export type CreateDatasetInput = Pick<Dataset, "projectId" | "name" | "files">

export interface UploadedSeries {
  name: string
  content: string
  label?: string
}
