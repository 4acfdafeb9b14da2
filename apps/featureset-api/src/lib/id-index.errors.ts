import { BaseError } from "@featurekit/errors"

export type IdIndexErrorCode = "index_contention"

export class IdIndexError extends BaseError<IdIndexErrorCode> {
  static contention(key: string, attempts: number): IdIndexError {
    return new IdIndexError(`Index ${key} kept changing, gave up after ${attempts} attempts`, {
      code: "index_contention",
      context: { key, attempts },
    })
  }
}
