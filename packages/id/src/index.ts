export { sequenceIds } from "./adapters/sequence"
export { uuidV4 } from "./adapters/uuid"
export type { IdGenerator } from "./ports/id-generator"
