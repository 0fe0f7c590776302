// src/pki/certificate.ts — X.509 certificate parsing

import { X509Certificate } from "node:crypto"
import { OperatorError, describeError } from "../charm/errors.js"

/** Anything that exposes DER-encoded certificate bytes. */
export interface TrustedCertificate {
  readonly raw: Uint8Array
}

export type CertificateParser = (base64: string) => TrustedCertificate

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/

/**
 * Parse a base64-encoded DER certificate. Whitespace (line breaks included)
 * is ignored, so both single-line and wrapped encodings are accepted.
 */
export function parseBase64Certificate(base64: string): X509Certificate {
  const compact = base64.replace(/\s+/g, "")
  if (!compact || !BASE64_RE.test(compact)) {
    throw new OperatorError("CERTIFICATE_INVALID", "certificate is not valid base64")
  }
  try {
    return new X509Certificate(Buffer.from(compact, "base64"))
  } catch (err) {
    throw new OperatorError("CERTIFICATE_INVALID", `could not parse certificate: ${describeError(err)}`)
  }
}

/** Parse a PEM block (or bundle, first certificate wins). */
export function parsePemCertificate(pem: string): X509Certificate {
  const match = /-----BEGIN CERTIFICATE-----([\s\S]+?)-----END CERTIFICATE-----/.exec(pem)
  if (!match) {
    throw new OperatorError("CERTIFICATE_INVALID", "no PEM certificate block found")
  }
  return parseBase64Certificate(match[1])
}

export function isTrustedCertificate(value: unknown): value is TrustedCertificate {
  return typeof value === "object"
    && value !== null
    && "raw" in value
    && value.raw instanceof Uint8Array
}
