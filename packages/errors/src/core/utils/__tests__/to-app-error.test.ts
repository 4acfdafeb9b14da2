import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns AppErrors unchanged", () => {
    const err = new BaseError("original", { code: "orig" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps plain errors as non-operational with the fallback code", () => {
    const err = new Error("standard")
    const result = toAppError(err, "pipeline_failed")

    expect(result.code).toBe("pipeline_failed")
    expect(result.message).toBe("standard")
    expect(result.isOperational).toBe(false)
    expect(result.cause).toBe(err)
  })

  it("wraps strings and other values", () => {
    expect(toAppError("nope").message).toBe("nope")
    expect(toAppError(42).context).toEqual({ value: 42 })
    expect(toAppError(42).code).toBe("unknown")
  })
})

describe("isAppError", () => {
  it("accepts BaseError instances", () => {
    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
  })

  it("rejects plain errors and lookalikes with invalid timestamps", () => {
    expect(isAppError(new Error("x"))).toBe(false)
    expect(isAppError(null)).toBe(false)
    expect(
      isAppError({
        name: "Fake",
        message: "fake",
        code: "fake",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date("not a date"),
      }),
    ).toBe(false)
  })
})
