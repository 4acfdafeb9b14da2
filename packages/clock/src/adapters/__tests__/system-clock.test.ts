import { SystemClock } from "../system-clock"

describe("SystemClock", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-02-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("reads the current time", () => {
    const clock = new SystemClock()

    expect(clock.now().toISOString()).toBe("2026-02-02T08:00:00.000Z")
    expect(clock.nowMs()).toBe(Date.parse("2026-02-02T08:00:00.000Z"))
  })

  it("resolves sleep after the delay", async () => {
    const clock = new SystemClock()
    const done = vi.fn()

    const pending = clock.sleep(500).then(done)

    await vi.advanceTimersByTimeAsync(499)
    expect(done).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toHaveBeenCalledOnce()
  })

  it("resolves early when aborted", async () => {
    const clock = new SystemClock()
    const controller = new AbortController()

    const pending = clock.sleep(60_000, controller.signal)
    controller.abort()

    await expect(pending).resolves.toBeUndefined()
  })
})
