// src/scheduler/index.ts — Scheduler module barrel export

export { Scheduler } from "./scheduler.js"
export type { ScheduledTaskDef, TaskStatus } from "./scheduler.js"
export { computeNextRunAtMs, parseSchedule } from "./schedule.js"
export type { Schedule } from "./schedule.js"
