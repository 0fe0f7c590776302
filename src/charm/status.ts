// src/charm/status.ts — Unit status values

export type UnitStatus =
  | { kind: "unknown"; message: "" }
  | { kind: "blocked"; message: string }
  | { kind: "waiting"; message: string }
  | { kind: "active"; message: string }

export type BlockedStatus = Extract<UnitStatus, { kind: "blocked" }>
export type WaitingStatus = Extract<UnitStatus, { kind: "waiting" }>

export function unknown(): UnitStatus {
  return { kind: "unknown", message: "" }
}

export function blocked(message: string): BlockedStatus {
  return { kind: "blocked", message }
}

export function waiting(message: string): WaitingStatus {
  return { kind: "waiting", message }
}

export function active(message = ""): UnitStatus {
  return { kind: "active", message }
}

export function isBlocked(status: UnitStatus | undefined): status is BlockedStatus {
  return status?.kind === "blocked"
}

export function isWaiting(status: UnitStatus | undefined): status is WaitingStatus {
  return status?.kind === "waiting"
}

export function formatStatus(status: UnitStatus): string {
  return status.message ? `${status.kind}: ${status.message}` : status.kind
}
