// src/charm/errors.ts — Typed operator errors

/** Error codes for operator operations */
export type OperatorErrorCode =
  | "RELATION_NOT_FOUND"
  | "TOO_MANY_RELATED_APPS"
  | "TRUST_PREFERENCES_INVALID"
  | "TRUSTSTORE_BUILD_FAILED"
  | "WORKLOAD_WRITE_FAILED"
  | "CERTIFICATE_INVALID"
  | "CONFIG_INVALID"
  | "SERVICE_UNKNOWN"
  | "LAYER_CONFLICT"
  | "NOT_LEADER"
  | "HARNESS_STATE"

/** Typed error for all operator operations */
export class OperatorError extends Error {
  override readonly name: string = "OperatorError"
  readonly code: OperatorErrorCode
  readonly context: Record<string, unknown>

  constructor(code: OperatorErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[operator] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/**
 * Raised when a lookup expects a single related application but the relation
 * name has several instances and no relation id was given.
 */
export class TooManyRelatedAppsError extends OperatorError {
  override readonly name = "TooManyRelatedAppsError"
  readonly relationName: string
  readonly count: number

  constructor(relationName: string, count: number) {
    super(
      "TOO_MANY_RELATED_APPS",
      `relation "${relationName}" has ${count} instances, expected at most 1`,
      { relationName, count },
    )
    this.relationName = relationName
    this.count = count
  }
}

/** Render an unknown thrown value as a message */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
