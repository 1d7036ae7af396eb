import {
  errorMessage,
  SigningError,
  TokenIssuerError,
} from '../plumbing/errors.ts'
import { getTokenEndpoint } from '../providers/microsoft-config.ts'
import { type Clock, systemClock } from './clock.ts'
import { base64UrlEncode, encodeJsonSegment } from './jwt.ts'
import type { SignFn } from './signer.ts'
import type { ClientAssertionClaims } from './types/client-assertion-claims.ts'
import type { JwtHeader } from './types/jwt-header.ts'

/** Assertions are valid for five minutes from `nbf` */
export const ASSERTION_LIFETIME_SECONDS = 300

export interface BuildClientAssertionInput {
  /** Base64URL SHA-1 certificate thumbprint */
  x5t: string
  tenantId: string
  clientId: string
  sign: SignFn
  clock?: Clock
  authorityHost?: string
}

export interface ClientAssertion {
  /** Compact JWT: header.claims.signature */
  assertion: string
  header: JwtHeader
  claims: ClientAssertionClaims
}

export const createAssertionHeader = (x5t: string): JwtHeader => ({
  alg: 'RS256',
  typ: 'JWT',
  x5t,
})

export const createAssertionClaims = (
  tokenEndpoint: string,
  clientId: string,
  clock: Clock = systemClock,
): ClientAssertionClaims => {
  const now = clock.nowSeconds()
  return {
    aud: tokenEndpoint,
    nbf: now,
    exp: now + ASSERTION_LIFETIME_SECONDS,
    jti: clock.newJti(),
    iss: clientId,
    sub: clientId,
  }
}

/**
 * Build and sign the client assertion presented to the token endpoint.
 * `sign` receives exactly the first two segments as they appear in the
 * returned token.
 */
export const buildClientAssertion = ({
  x5t,
  tenantId,
  clientId,
  sign,
  clock = systemClock,
  authorityHost,
}: BuildClientAssertionInput): ClientAssertion => {
  const header = createAssertionHeader(x5t)
  const claims = createAssertionClaims(
    getTokenEndpoint(tenantId, authorityHost),
    clientId,
    clock,
  )

  const signatureInput = `${encodeJsonSegment(header)}.${encodeJsonSegment(claims)}`

  let signature: Buffer
  try {
    signature = sign(signatureInput)
  } catch (error) {
    if (error instanceof TokenIssuerError) {
      throw error
    }
    throw new SigningError(`Signing failed: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  return {
    assertion: `${signatureInput}.${base64UrlEncode(signature)}`,
    header,
    claims,
  }
}
