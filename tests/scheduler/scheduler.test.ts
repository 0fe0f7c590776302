// tests/scheduler/scheduler.test.ts — Periodic task execution

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest"
import { Scheduler } from "../../src/scheduler/scheduler.js"

beforeEach(() => {
  vi.useFakeTimers()
  vi.setSystemTime(new Date("2026-01-01T00:00:00Z"))
})

afterEach(() => {
  vi.useRealTimers()
})

describe("Scheduler", () => {
  it("runs interval tasks repeatedly once started", async () => {
    const scheduler = new Scheduler()
    const handler = vi.fn(async () => {})
    scheduler.register({ id: "update-status", name: "status", schedule: { kind: "every", expression: "30s" }, handler })

    await vi.advanceTimersByTimeAsync(60_000)
    expect(handler).not.toHaveBeenCalled()

    scheduler.start()
    await vi.advanceTimersByTimeAsync(30_000)
    expect(handler).toHaveBeenCalledTimes(1)
    await vi.advanceTimersByTimeAsync(30_000)
    expect(handler).toHaveBeenCalledTimes(2)
    expect(scheduler.getStatus()[0]).toMatchObject({ id: "update-status", state: "waiting", runs: 2 })

    scheduler.stop()
  })

  it("fires cron tasks at the next occurrence", async () => {
    const scheduler = new Scheduler()
    const handler = vi.fn(async () => {})
    scheduler.register({ id: "cron", name: "cron", schedule: { kind: "cron", expression: "*/5 * * * *" }, handler })
    scheduler.start()

    await vi.advanceTimersByTimeAsync(299_000)
    expect(handler).not.toHaveBeenCalled()
    await vi.advanceTimersByTimeAsync(1_000)
    expect(handler).toHaveBeenCalledTimes(1)

    scheduler.stop()
  })

  it("records failures and keeps scheduling", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    const scheduler = new Scheduler()
    const handler = vi.fn(async () => {
      throw new Error("reconcile failed")
    })
    scheduler.register({ id: "flaky", name: "flaky", schedule: { kind: "every", expression: "10s" }, handler })
    scheduler.start()

    await vi.advanceTimersByTimeAsync(20_000)

    expect(handler).toHaveBeenCalledTimes(2)
    expect(scheduler.getStatus()[0]).toMatchObject({ state: "error", lastError: "reconcile failed", runs: 2 })
    expect(error).toHaveBeenCalledWith("[scheduler] task flaky failed:", "reconcile failed")
    scheduler.stop()
    error.mockRestore()
  })

  it("stops firing after stop()", async () => {
    const scheduler = new Scheduler()
    const handler = vi.fn(async () => {})
    scheduler.register({ id: "t", name: "t", schedule: { kind: "every", expression: "10s" }, handler })
    scheduler.start()
    scheduler.stop()

    await vi.advanceTimersByTimeAsync(60_000)
    expect(handler).not.toHaveBeenCalled()
    expect(scheduler.isStarted).toBe(false)
  })

  it("schedules tasks registered after start", async () => {
    const scheduler = new Scheduler()
    scheduler.start()
    const handler = vi.fn(async () => {})
    scheduler.register({ id: "late", name: "late", schedule: { kind: "every", expression: "5s" }, handler })

    await vi.advanceTimersByTimeAsync(5_000)
    expect(handler).toHaveBeenCalledTimes(1)
    scheduler.stop()
  })

  it("rejects duplicate ids", () => {
    const scheduler = new Scheduler()
    const def = { id: "t", name: "t", schedule: { kind: "every" as const, expression: "5s" }, handler: async () => {} }
    scheduler.register(def)
    expect(() => scheduler.register(def)).toThrow(/already registered/)
  })
})
