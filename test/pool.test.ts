import { describe, expect, it } from "vitest"
import { setTimeout as sleep } from "timers/promises"
import { parallelMap, settle } from "../src/pool"

describe("parallelMap", () => {
  it("keeps input order when tasks finish out of order", async () => {
    const results = await parallelMap([30, 10, 20, 0], 4, async (ms, index) => {
      await sleep(ms)
      return `${index}:${ms}`
    })
    expect(results).toEqual(["0:30", "1:10", "2:20", "3:0"])
  })

  it("runs at most the given number of tasks at once", async () => {
    let active = 0
    let peak = 0
    await parallelMap([1, 2, 3, 4, 5, 6], 2, async () => {
      active++
      peak = Math.max(peak, active)
      await sleep(5)
      active--
    })
    expect(peak).toBe(2)
  })

  it("rejects with the first failure", async () => {
    await expect(parallelMap([1, 2], 1, async item => {
      if (item == 1) {
        throw new Error("boom")
      }
      return item
    })).rejects.toThrow("boom")
  })
})

describe("settle", () => {
  it("captures the outcome of one task", async () => {
    expect(await settle(async () => 1)).toEqual({ ok: true, value: 1 })
    const failed = await settle(async () => {
      throw new Error("bad")
    })
    expect(failed.ok).toBe(false)
  })
})
