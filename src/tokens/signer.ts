import crypto from 'node:crypto'
import { errorMessage, KeyError, SigningError } from '../plumbing/errors.ts'

/**
 * Capability to sign the `header.claims` string of a JWT with RSA-SHA256.
 * Returns the raw signature bytes.
 */
export type SignFn = (message: string) => Buffer

/** PKCS#1 v1.5 over a SHA-256 digest is not accepted below this size */
export const MIN_RSA_MODULUS_BITS = 2048

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code

/**
 * Load an RSA private key from PEM (PKCS#1 or PKCS#8, optionally encrypted).
 */
export const loadRsaPrivateKey = (
  pem: string | Buffer,
  passphrase?: string,
): crypto.KeyObject => {
  let key: crypto.KeyObject
  try {
    key = crypto.createPrivateKey({ key: pem, format: 'pem', passphrase })
  } catch (error) {
    if (hasErrorCode(error, 'ERR_MISSING_PASSPHRASE')) {
      throw new KeyError(
        'Private key is encrypted and no passphrase was supplied',
        { cause: error },
      )
    }
    throw new KeyError(
      `Private key could not be loaded: ${errorMessage(error)}`,
      { cause: error },
    )
  }

  if (key.asymmetricKeyType !== 'rsa') {
    throw new KeyError(
      `Private key must be an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`,
    )
  }
  return key
}

/**
 * RSASSA-PKCS1-v1_5 with SHA-256 over the UTF-8 bytes of `message`.
 */
export const signRsaSha256 = (
  key: crypto.KeyObject,
  message: string,
): Buffer => {
  const modulusLength = key.asymmetricKeyDetails?.modulusLength ?? 0
  if (modulusLength < MIN_RSA_MODULUS_BITS) {
    throw new SigningError(
      `RSA key is ${modulusLength} bits; at least ${MIN_RSA_MODULUS_BITS} bits are required`,
    )
  }

  try {
    const sign = crypto.createSign('RSA-SHA256')
    sign.update(message, 'utf8')
    sign.end()
    return sign.sign(key)
  } catch (error) {
    throw new SigningError(`Signing failed: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}

export const sign = (
  privateKeyPem: string | Buffer,
  message: string,
  passphrase?: string,
): Buffer => signRsaSha256(loadRsaPrivateKey(privateKeyPem, passphrase), message)

/**
 * Load the key now and return a signing capability bound to it, so a bad key
 * surfaces before anything is sent over the network.
 */
export const createRsaSha256Signer = (
  privateKey: crypto.KeyObject | string | Buffer,
  passphrase?: string,
): SignFn => {
  const key =
    privateKey instanceof crypto.KeyObject
      ? privateKey
      : loadRsaPrivateKey(privateKey, passphrase)
  return (message) => signRsaSha256(key, message)
}
