import { createJsonCodec } from "../codec"

describe("createJsonCodec", () => {
  it("restores dates", () => {
    const codec = createJsonCodec<{ name: string; finishedAt: Date | null }>()
    const value = { name: "first", finishedAt: new Date("2026-03-01T00:00:05Z") }

    const decoded = codec.decode(codec.encode(value))

    expect(decoded).toEqual(value)
    expect(decoded.finishedAt).toBeInstanceOf(Date)
  })
})
