// src/config.ts — Operator configuration loader from environment variables

import { parseSchedule, type Schedule } from "./scheduler/schedule.js"

export interface OperatorConfig {
  // Identity
  appName: string
  unitName: string

  // Status server
  statusServer: {
    enabled: boolean
    host: string
    port: number
  }

  /** Root directory standing in for the workload container's file system */
  workloadRoot: string

  /** How often update-status fires: interval ("5m") or cron expression */
  updateStatus: Schedule
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: NodeJS.ProcessEnv, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parseBoolEnv(env: NodeJS.ProcessEnv, envKey: string, fallback: boolean): boolean {
  const raw = env[envKey]
  if (raw === undefined || raw.trim() === "") return fallback
  const value = raw.trim().toLowerCase()
  if (value === "true" || value === "1") return true
  if (value === "false" || value === "0") return false
  throw new Error(`${envKey} must be true or false (got "${raw}")`)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OperatorConfig {
  const appName = env.LEGEND_APP_NAME
  if (!appName) {
    throw new Error("LEGEND_APP_NAME is required")
  }

  const scheduleExpression = env.LEGEND_UPDATE_STATUS_INTERVAL ?? "5m"
  let updateStatus: Schedule
  try {
    updateStatus = parseSchedule(scheduleExpression)
  } catch (err) {
    throw new Error(`LEGEND_UPDATE_STATUS_INTERVAL is invalid: ${err instanceof Error ? err.message : String(err)}`)
  }

  return {
    appName,
    unitName: env.LEGEND_UNIT_NAME ?? `${appName}/0`,

    statusServer: {
      enabled: parseBoolEnv(env, "LEGEND_STATUS_SERVER", true),
      host: env.LEGEND_OPERATOR_HOST ?? "0.0.0.0",
      port: parseIntEnv(env, "LEGEND_OPERATOR_PORT", "8080"),
    },

    workloadRoot: env.LEGEND_WORKLOAD_ROOT ?? "./workload",
    updateStatus,
  }
}
