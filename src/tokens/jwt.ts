import crypto from 'node:crypto'
import { isRecord } from '../plumbing/is-record.ts'

/**
 * Encodes a Buffer to Base64URL format
 * Base64URL is Base64 with URL-safe characters and no padding
 */
export const base64UrlEncode = (buffer: Buffer): string => {
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '')
}

/**
 * Decodes a Base64URL string to a Buffer
 * Handles padding restoration for proper Base64 decoding
 */
export const base64UrlDecode = (str: string): Buffer => {
  let base64 = str.replace(/-/g, '+').replace(/_/g, '/')
  while (base64.length % 4) {
    base64 += '='
  }
  return Buffer.from(base64, 'base64')
}

/**
 * Compact JSON, UTF-8, Base64URL: one JWT segment.
 */
export const encodeJsonSegment = (value: object): string =>
  base64UrlEncode(Buffer.from(JSON.stringify(value), 'utf8'))

const decodeJsonSegment = (segment: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(
    base64UrlDecode(segment).toString('utf8'),
  )
  if (!isRecord(parsed)) {
    throw new Error('JWT segment is not a JSON object')
  }
  return parsed
}

/**
 * Parses a JWT into its component parts without checking the signature
 */
export const parseJwt = (
  token: string,
): {
  header: Record<string, unknown>
  payload: Record<string, unknown>
  signature: string
} => {
  const parts = token.split('.')
  if (parts.length !== 3) {
    throw new Error('Invalid JWT format: token must have three parts')
  }

  const [encodedHeader, encodedPayload, encodedSignature] = parts

  try {
    return {
      header: decodeJsonSegment(encodedHeader),
      payload: decodeJsonSegment(encodedPayload),
      signature: encodedSignature,
    }
  } catch (error) {
    throw new Error(
      `Invalid JWT format: failed to parse token parts - ${error instanceof Error ? error.message : String(error)}`,
    )
  }
}

/**
 * Checks an RS256 signature over the first two segments of a compact JWT.
 * Claims are not validated.
 */
export const verifyJwtSignature = (
  token: string,
  publicKey: string | Buffer | crypto.KeyObject,
): boolean => {
  const parts = token.split('.')
  if (parts.length !== 3) {
    return false
  }

  // Signature was computed over the first two segments, byte for byte
  const signatureInput = `${parts[0]}.${parts[1]}`
  const verify = crypto.createVerify('RSA-SHA256')
  verify.update(signatureInput, 'utf8')
  verify.end()

  const keyObject =
    typeof publicKey === 'string' || Buffer.isBuffer(publicKey)
      ? crypto.createPublicKey(publicKey)
      : publicKey

  return verify.verify(keyObject, base64UrlDecode(parts[2]))
}
