// tests/scheduler/schedule.test.ts — Schedule parsing

import { describe, it, expect } from "vitest"
import { computeNextRunAtMs, parseSchedule } from "../../src/scheduler/schedule.js"

describe("parseSchedule", () => {
  it("recognises intervals", () => {
    expect(parseSchedule(" 5m ")).toEqual({ kind: "every", expression: "5m" })
    expect(parseSchedule("2d")).toEqual({ kind: "every", expression: "2d" })
  })

  it("rejects a zero interval", () => {
    expect(() => parseSchedule("0s")).toThrow('Interval must be positive: "0s"')
  })

  it("accepts cron expressions", () => {
    expect(parseSchedule("*/5 * * * *")).toEqual({ kind: "cron", expression: "*/5 * * * *" })
  })

  it("rejects invalid cron expressions", () => {
    expect(() => parseSchedule("not a schedule")).toThrow(/Invalid cron expression: "not a schedule"/)
  })
})

describe("computeNextRunAtMs", () => {
  const from = Date.parse("2026-01-01T00:07:00Z")

  it.each([
    ["30s", 30_000],
    ["5m", 300_000],
    ["1h", 3_600_000],
    ["2d", 172_800_000],
  ])("adds %s as %d ms", (expression, ms) => {
    expect(computeNextRunAtMs({ kind: "every", expression }, from)).toBe(from + ms)
  })

  it("rejects an interval schedule it cannot read", () => {
    expect(() => computeNextRunAtMs({ kind: "every", expression: "5 minutes" }, from)).toThrow(
      'Invalid interval: "5 minutes"',
    )
  })

  it("finds the next cron occurrence", () => {
    expect(computeNextRunAtMs({ kind: "cron", expression: "*/5 * * * *" }, from)).toBe(
      Date.parse("2026-01-01T00:10:00Z"),
    )
  })
})
