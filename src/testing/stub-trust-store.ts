// src/testing/stub-trust-store.ts — Trust store factory that records calls and returns fixed bytes

import type { TrustedCertificate } from "../pki/certificate.js"
import type { TrustStore, TrustStoreFactory } from "../pki/trust-store.js"

export const STUB_TRUSTSTORE_DATA = "stub-truststore-data"

export class StubTrustStores {
  readonly created: Array<Record<string, TrustedCertificate>> = []
  readonly passphrases: string[] = []
  /** When set, the factory throws this instead of building a store. */
  failure: Error | undefined

  readonly factory: TrustStoreFactory = (certificates) => {
    if (this.failure) throw this.failure
    this.created.push(certificates)
    const store: TrustStore = {
      add: () => undefined,
      saves: (passphrase) => {
        this.passphrases.push(passphrase)
        return STUB_TRUSTSTORE_DATA
      },
    }
    return store
  }

  reset(): void {
    this.created.length = 0
    this.passphrases.length = 0
    this.failure = undefined
  }
}
