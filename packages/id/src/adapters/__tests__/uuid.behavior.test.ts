import { uuidV4 } from "../uuid"

describe("uuidV4 (behavior)", () => {
  it("generates valid v4 format", () => {
    const id = uuidV4.generate()

    expect(id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i,
    )
  })
})
