import { describe, expect, it } from "vitest"
import { CountdownLatch } from "../src/index"

describe(`CountdownLatch`, () => {
  it(`should count down to zero`, () => {
    const latch = new CountdownLatch(2)

    expect(latch.count).toBe(2)
    expect(latch.dec()).toBe(1)
    expect(latch.dec()).toBe(0)
    expect(latch.count).toBe(0)
  })

  it(`should refuse to go below zero`, () => {
    const latch = new CountdownLatch(1)
    latch.dec()

    expect(() => latch.dec()).toThrow(`Latch is already open`)
    expect(latch.count).toBe(0)
  })

  it(`should start open with a count of zero`, () => {
    expect(() => new CountdownLatch(0).dec()).toThrow(RangeError)
  })

  it(`should reject invalid counts`, () => {
    expect(() => new CountdownLatch(-1)).toThrow(RangeError)
    expect(() => new CountdownLatch(1.5)).toThrow(RangeError)
  })
})
