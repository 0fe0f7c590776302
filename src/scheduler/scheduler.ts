// src/scheduler/scheduler.ts — Periodic task execution for operator events

import { computeNextRunAtMs, type Schedule } from "./schedule.js"

export interface ScheduledTaskDef {
  id: string
  name: string
  schedule: Schedule
  /** Applied to interval schedules only: delay varies by ±jitterMs. */
  jitterMs?: number
  handler: () => Promise<void>
}

interface RunningTask {
  def: ScheduledTaskDef
  timer: ReturnType<typeof setTimeout> | undefined
  lastRun: number | undefined
  lastError: string | undefined
  runs: number
  running: boolean
}

export interface TaskStatus {
  id: string
  name: string
  state: "running" | "waiting" | "error"
  lastRun: number | undefined
  lastError: string | undefined
  runs: number
}

const MIN_DELAY_MS = 1000

export class Scheduler {
  private tasks = new Map<string, RunningTask>()
  private started = false

  register(def: ScheduledTaskDef): void {
    if (this.tasks.has(def.id)) {
      throw new Error(`task "${def.id}" is already registered`)
    }
    const task: RunningTask = {
      def,
      timer: undefined,
      lastRun: undefined,
      lastError: undefined,
      runs: 0,
      running: false,
    }
    this.tasks.set(def.id, task)
    if (this.started) this.scheduleNext(task)
  }

  start(): void {
    if (this.started) return
    this.started = true

    for (const task of this.tasks.values()) {
      this.scheduleNext(task)
    }
  }

  stop(): void {
    this.started = false
    for (const task of this.tasks.values()) {
      if (task.timer) {
        clearTimeout(task.timer)
        task.timer = undefined
      }
    }
  }

  get isStarted(): boolean {
    return this.started
  }

  getStatus(): TaskStatus[] {
    return Array.from(this.tasks.values()).map((t) => {
      let state: TaskStatus["state"] = "waiting"
      if (t.running) state = "running"
      else if (t.lastError) state = "error"

      return {
        id: t.def.id,
        name: t.def.name,
        state,
        lastRun: t.lastRun,
        lastError: t.lastError,
        runs: t.runs,
      }
    })
  }

  private delayFor(def: ScheduledTaskDef, now: number): number | null {
    const next = computeNextRunAtMs(def.schedule, now)
    if (next === null) return null
    const jitter = def.schedule.kind === "every" ? (def.jitterMs ?? 0) * (2 * Math.random() - 1) : 0
    return Math.max(MIN_DELAY_MS, next - now + jitter)
  }

  private scheduleNext(task: RunningTask): void {
    if (!this.started) return

    const delay = this.delayFor(task.def, Date.now())
    if (delay === null) {
      console.warn(`[scheduler] task ${task.def.id} has no future run; not rescheduled`)
      return
    }

    task.timer = setTimeout(async () => {
      await this.runTask(task)
      this.scheduleNext(task)
    }, delay)

    // Allow Node to exit cleanly if only timers remain
    task.timer.unref()
  }

  private async runTask(task: RunningTask): Promise<void> {
    task.running = true
    try {
      await task.def.handler()
      task.lastError = undefined
    } catch (err) {
      task.lastError = err instanceof Error ? err.message : String(err)
      console.error(`[scheduler] task ${task.def.id} failed:`, task.lastError)
    } finally {
      task.lastRun = Date.now()
      task.runs++
      task.running = false
    }
  }
}
