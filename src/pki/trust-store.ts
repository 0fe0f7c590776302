// src/pki/trust-store.ts — Truststore construction, supplied by the host

import type { TrustedCertificate } from "./certificate.js"

export interface TrustStore {
  add(alias: string, certificate: TrustedCertificate): void
  /** Serialized truststore, protected by the passphrase. */
  saves(passphrase: string): string | Uint8Array
}

/** Builds a store already holding `certificates`; may throw. */
export type TrustStoreFactory = (certificates: Record<string, TrustedCertificate>) => TrustStore
