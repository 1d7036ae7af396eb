/**
 * JOSE header of a certificate-based client assertion.
 */
export interface JwtHeader {
  alg: 'RS256'
  typ: 'JWT'
  /** Base64URL SHA-1 thumbprint of the signing certificate */
  x5t: string
}
