// src/charm/trust-provisioner.ts — Builds the JKS truststore and writes it to the workload

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { isTrustedCertificate, type TrustedCertificate } from "../pki/certificate.js"
import type { TrustStoreFactory } from "../pki/trust-store.js"
import type { WorkloadFileSystem } from "../workload/types.js"
import { describeError } from "./errors.js"
import { blocked, type BlockedStatus } from "./status.js"
import type { TrustPreferences } from "./types.js"

const TrustPreferencesSchema = Type.Object({
  truststorePath: Type.String({ minLength: 1 }),
  truststorePassphrase: Type.String(),
  trustedCertificates: Type.Record(Type.String(), Type.Unknown(), { minProperties: 1 }),
})

type TrustPreferencesShape = Static<typeof TrustPreferencesSchema>

export type TrustValidation =
  | { ok: true; preferences: TrustPreferences }
  | { ok: false; reason: string }

export const TRUSTSTORE_WRITE_FAILED_MESSAGE =
  "error(s) occurred while adding jks trust store to the workload container"

export function validateTrustPreferences(input: unknown): TrustValidation {
  if (!Value.Check(TrustPreferencesSchema, input)) {
    const first = Value.Errors(TrustPreferencesSchema, input).First()
    const where = first?.path ? `${first.path} ` : ""
    return { ok: false, reason: first ? `${where}${first.message}`.trim() : "unexpected shape" }
  }
  const shape: TrustPreferencesShape = input
  const certificates: Record<string, TrustedCertificate> = {}
  for (const [alias, certificate] of Object.entries(shape.trustedCertificates)) {
    if (!isTrustedCertificate(certificate)) {
      return { ok: false, reason: `certificate "${alias}" is not a parsed certificate` }
    }
    certificates[alias] = certificate
  }
  return {
    ok: true,
    preferences: {
      truststorePath: shape.truststorePath,
      truststorePassphrase: shape.truststorePassphrase,
      trustedCertificates: certificates,
    },
  }
}

export class TrustProvisioner {
  constructor(private readonly createTrustStore: TrustStoreFactory) {}

  /**
   * One attempt at placing the truststore into the workload.
   * Returns a blocked status on failure, undefined on success; never throws
   * for invalid input, build errors or write failures.
   */
  async provision(container: WorkloadFileSystem, input: unknown): Promise<BlockedStatus | undefined> {
    const validation = validateTrustPreferences(input)
    if (!validation.ok) {
      return blocked(`invalid jks truststore preferences: ${validation.reason}`)
    }
    const { truststorePath, truststorePassphrase, trustedCertificates } = validation.preferences

    let data: string | Uint8Array
    try {
      const store = this.createTrustStore(trustedCertificates)
      data = store.saves(truststorePassphrase)
    } catch (err) {
      console.error(`[reconciler] truststore build failed: ${describeError(err)}`)
      return blocked(`error(s) occurred while building jks truststore: ${describeError(err)}`)
    }

    const written = await container.writeFile(truststorePath, data, { raiseOnError: false })
    if (!written) {
      return blocked(TRUSTSTORE_WRITE_FAILED_MESSAGE)
    }
    return undefined
  }
}
