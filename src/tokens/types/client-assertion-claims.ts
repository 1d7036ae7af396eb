/**
 * Claim set of a client assertion (RFC 7523 section 3).
 */
export interface ClientAssertionClaims {
  /** Token endpoint the assertion is presented to */
  aud: string
  /** Not before (Unix seconds) */
  nbf: number
  /** Expiration (Unix seconds), always nbf + 300 */
  exp: number
  /** Unique per assertion; the provider rejects replays */
  jti: string
  /** Client (application) id */
  iss: string
  /** Client (application) id, same as iss */
  sub: string
}
