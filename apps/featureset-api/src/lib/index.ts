export { createJsonCodec } from "./codec"
export {
  type IdIndex,
  IdIndexStore,
  type IdIndexStoreDeps,
  type IdIndexStoreOptions,
} from "./id-index"
export { IdIndexError, type IdIndexErrorCode } from "./id-index.errors"
export { parseIdParam, readJsonBody } from "./request"
