import { X509Certificate } from 'node:crypto'
import { CertificateError, errorMessage } from '../plumbing/errors.ts'
import { base64UrlEncode } from '../tokens/jwt.ts'

/** SHA-1 digest length in bytes */
export const SHA1_FINGERPRINT_LENGTH = 20

const HEX_BYTE = /^[0-9a-fA-F]{2}$/

/**
 * Parse a PEM or DER encoded X.509 certificate.
 */
export const loadCertificate = (bytes: Buffer | string): X509Certificate => {
  if (bytes.length === 0) {
    throw new CertificateError('Certificate is empty')
  }
  try {
    return new X509Certificate(bytes)
  } catch (error) {
    throw new CertificateError(
      `Certificate could not be parsed as X.509: ${errorMessage(error)}`,
      { cause: error },
    )
  }
}

/**
 * Decode a SHA-1 fingerprint written as hex (`AA:BB:...` or `AABB...`) into
 * its 20 raw bytes. The x5t header carries these bytes, never the hex text.
 */
export const fingerprintHexToBytes = (fingerprint: string): Buffer => {
  const hex = fingerprint.trim()
  const pairs: string[] = hex.includes(':')
    ? hex.split(':')
    : (hex.match(/../g) ?? [])

  if (
    pairs.length !== SHA1_FINGERPRINT_LENGTH ||
    pairs.join('').length !== hex.replace(/:/g, '').length ||
    !pairs.every((pair) => HEX_BYTE.test(pair))
  ) {
    throw new CertificateError(
      `Expected a ${SHA1_FINGERPRINT_LENGTH}-byte SHA-1 fingerprint, got "${fingerprint}"`,
    )
  }

  const bytes = Buffer.alloc(SHA1_FINGERPRINT_LENGTH)
  pairs.forEach((pair, index) => {
    bytes.writeUInt8(Number.parseInt(pair, 16), index)
  })
  return bytes
}

/** x5t value for a fingerprint given in hex. */
export const thumbprintFromHex = (fingerprint: string): string =>
  base64UrlEncode(fingerprintHexToBytes(fingerprint))

/**
 * x5t header value: Base64URL (no padding) of the SHA-1 digest of the
 * DER-encoded certificate.
 */
export const computeThumbprint = (certificate: X509Certificate): string =>
  thumbprintFromHex(certificate.fingerprint)
