import { describeIdGeneratorContract } from "../../ports/__tests__/id-generator.contract"
import { sequenceIds } from "../sequence"

describeIdGeneratorContract("sequenceIds", () => sequenceIds("t-"))

describe("sequenceIds", () => {
  it("counts up from the start value", () => {
    const ids = sequenceIds("t-", 123)

    expect(ids.generate()).toBe("t-123")
    expect(ids.generate()).toBe("t-124")
  })

  it("keeps separate counters per generator", () => {
    const a = sequenceIds()
    const b = sequenceIds()

    a.generate()

    expect(a.generate()).toBe("2")
    expect(b.generate()).toBe("1")
  })
})
