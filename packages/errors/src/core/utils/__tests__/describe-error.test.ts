import { BaseError } from "../../base-error"
import { describeError } from "../describe-error"

describe("describeError", () => {
  it("uses the error message", () => {
    expect(describeError(new Error("Series has no samples"))).toBe(
      "Series has no samples",
    )
    expect(describeError(new BaseError("denied", { code: "denied" }))).toBe("denied")
  })

  it("falls back to the error name for empty messages", () => {
    expect(describeError(new TypeError(""))).toBe("TypeError")
  })

  it("stringifies primitives", () => {
    expect(describeError("worker lost")).toBe("worker lost")
    expect(describeError(404)).toBe("404")
    expect(describeError(false)).toBe("false")
  })

  it("does not dump objects", () => {
    expect(describeError({ secret: "test-secret" })).toBe("Unknown error")
    expect(describeError(undefined)).toBe("Unknown error")
  })
})
