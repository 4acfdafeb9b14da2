import { NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without output", () => {
    const write = vi.spyOn(process.stdout, "write")
    const logger = new NullLogger()

    logger.trace("t")
    logger.debug("d")
    logger.info("i", { requestId: "r-1" })
    logger.warn("w")
    logger.error("e", { err: new Error("x") })
    logger.fatal("f")

    expect(write).not.toHaveBeenCalled()
  })

  it("child returns another NullLogger", () => {
    const child = new NullLogger().child({ module: "hub" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
