import { isNonEmptyString } from "../is-non-empty-string"

describe("isNonEmptyString", () => {
  it.each(["req-1", "  padded  "])("accepts %j", (value) => {
    expect(isNonEmptyString(value)).toBe(true)
  })

  it.each(["", "   ", "\t\n", undefined, null, 42, {}])("rejects %j", (value) => {
    expect(isNonEmptyString(value)).toBe(false)
  })
})
