import { BaseError } from "../base-error"

type DatasetErrorCode = "dataset_missing" | "dataset_locked"

class DatasetError extends BaseError<DatasetErrorCode> {
  static missing(datasetId: number): DatasetError {
    return new DatasetError("Dataset missing", {
      code: "dataset_missing",
      context: { datasetId },
    })
  }
}

describe("BaseError", () => {
  it("applies defaults for retry and operational flags", () => {
    const err = new BaseError("boom", { code: "boom" })

    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
    expect(err.context).toEqual({})
    expect(err.cause).toBeUndefined()
  })

  it("uses the subclass name", () => {
    const err = DatasetError.missing(7)

    expect(err.name).toBe("DatasetError")
    expect(err.code).toBe("dataset_missing")
    expect(err.context).toEqual({ datasetId: 7 })
    expect(err).toBeInstanceOf(Error)
  })

  it("freezes context", () => {
    const context = { datasetId: 1 }
    const err = new BaseError("x", { code: "x", context })

    expect(Object.isFrozen(err.context)).toBe(true)
    expect(err.context).not.toBe(context)
  })

  it("keeps the cause", () => {
    const cause = new Error("disk full")
    const err = new BaseError("write failed", { code: "write_failed", cause })

    expect(err.cause).toBe(cause)
  })

  it("serializes through toJSON", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"))

    const err = DatasetError.missing(3)

    expect(JSON.parse(JSON.stringify(err))).toEqual({
      name: "DatasetError",
      code: "dataset_missing",
      message: "Dataset missing",
      context: { datasetId: 3 },
      isOperational: true,
      timestamp: "2026-03-01T12:00:00.000Z",
    })

    vi.useRealTimers()
  })
})
