import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at the provided initial time", () => {
    expect(new FakeClock(1000).nowMs()).toBe(1000)
  })

  it("defaults to 0 if no initial time provided", () => {
    expect(new FakeClock().nowMs()).toBe(0)
  })

  it("advance() moves time forward", () => {
    const clock = new FakeClock(0)
    clock.advance(100)

    expect(clock.nowMs()).toBe(100)

    clock.advance(50)

    expect(clock.nowMs()).toBe(150)
  })

  it("set() moves time to exact value", () => {
    const clock = new FakeClock(0)

    clock.set(Date.UTC(2022, 5, 12, 10, 41, 3, 456))

    expect(clock.now().toISOString()).toBe("2022-06-12T10:41:03.456Z")
  })
})
