const FEATURESETS_NS = "featuresets"
const COUNTERS_NS = "counters"

export function featuresetKey(id: number): string {
  return `${FEATURESETS_NS}:${id}`
}

export function featuresetProjectIndexKey(projectId: number): string {
  return `${FEATURESETS_NS}:project-index:${projectId}`
}

export const FEATURESET_COUNTER_KEY = `${COUNTERS_NS}:${FEATURESETS_NS}`
