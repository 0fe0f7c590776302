// src/scheduler/schedule.ts — When periodic operator events fire

import { Cron } from "croner"

/** `every` takes a count and a unit ("30s", "5m", "1h", "2d"); `cron` anything croner accepts. */
export interface Schedule {
  kind: "cron" | "every"
  expression: string
}

const UNIT_MS = { s: 1_000, m: 60_000, h: 3_600_000, d: 86_400_000 } as const

function isUnit(unit: string): unit is keyof typeof UNIT_MS {
  return unit in UNIT_MS
}

function everyMs(expression: string): number | undefined {
  const unit = expression.slice(-1)
  const count = expression.slice(0, -1)
  if (!isUnit(unit) || !/^\d+$/.test(count)) return undefined
  return Number(count) * UNIT_MS[unit]
}

export function parseSchedule(input: string): Schedule {
  const expression = input.trim()
  const ms = everyMs(expression)
  if (ms !== undefined) {
    if (ms === 0) throw new Error(`Interval must be positive: "${expression}"`)
    return { kind: "every", expression }
  }

  try {
    new Cron(expression)
  } catch (err) {
    throw new Error(
      `Invalid cron expression: "${expression}" (${err instanceof Error ? err.message : String(err)})`,
    )
  }
  return { kind: "cron", expression }
}

/** Next fire time in epoch ms, or null when a cron pattern never fires again. */
export function computeNextRunAtMs(schedule: Schedule, fromMs: number = Date.now()): number | null {
  if (schedule.kind === "cron") {
    const next = new Cron(schedule.expression).nextRun(new Date(fromMs))
    return next ? next.getTime() : null
  }
  const ms = everyMs(schedule.expression)
  if (!ms) throw new Error(`Invalid interval: "${schedule.expression}"`)
  return fromMs + ms
}
