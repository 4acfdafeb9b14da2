const PROJECTS_NS = "projects"
const DATASETS_NS = "datasets"
const COUNTERS_NS = "counters"

export function projectKey(id: number): string {
  return `${PROJECTS_NS}:${id}`
}

export function projectOwnerIndexKey(ownerId: string): string {
  return `${PROJECTS_NS}:owner-index:${ownerId}`
}

export function datasetKey(id: number): string {
  return `${DATASETS_NS}:${id}`
}

export const PROJECT_COUNTER_KEY = `${COUNTERS_NS}:${PROJECTS_NS}`
export const DATASET_COUNTER_KEY = `${COUNTERS_NS}:${DATASETS_NS}`
