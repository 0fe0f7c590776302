// src/gateway/server.ts — Hono status server for the operator

import { Hono } from "hono"
import type { OperatorCharm } from "../charm/operator.js"
import type { UnitStatus } from "../charm/status.js"
import type { Scheduler } from "../scheduler/scheduler.js"

export type HealthState = "healthy" | "degraded" | "unhealthy"

export interface AppOptions {
  charm: OperatorCharm
  scheduler?: Scheduler
  /** Default: process.uptime */
  uptime?: () => number
}

/** Active is healthy, waiting is degraded, blocked or not yet evaluated is unhealthy. */
export function healthFromStatus(status: UnitStatus): HealthState {
  switch (status.kind) {
    case "active":
      return "healthy"
    case "waiting":
      return "degraded"
    case "blocked":
    case "unknown":
      return "unhealthy"
  }
}

export function createApp(options: AppOptions) {
  const app = new Hono()
  const { charm } = options
  const uptime = options.uptime ?? (() => process.uptime())

  // Health endpoint: 503 only when unhealthy, so a waiting unit stays routable.
  app.get("/health", (c) => {
    const unit = charm.unitStatus
    const status = healthFromStatus(unit)
    return c.json(
      {
        status,
        uptime: uptime(),
        unit: { status: unit.kind, message: unit.message },
      },
      status === "unhealthy" ? 503 : 200,
    )
  })

  app.get("/status", (c) => {
    const { model } = charm.ctx
    const unit = charm.unitStatus
    return c.json({
      app: model.appName,
      unit: model.unitName,
      leader: model.isLeader(),
      status: { kind: unit.kind, message: unit.message },
      relations: model.relations.all().map((r) => ({
        id: r.id,
        name: r.name,
        app: r.app,
        units: [...r.units],
      })),
      services: charm.workloadContainer.services(),
      passes: charm.reconciler.passCount,
      scheduler: options.scheduler?.getStatus() ?? [],
    })
  })

  return app
}
