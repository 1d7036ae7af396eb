/**
 * Successful token endpoint response, returned to the caller verbatim. The
 * provider usually sends `token_type`, `expires_in`, `ext_expires_in` and
 * `access_token`; none of them is checked here and the token stays opaque.
 */
export type TokenResponse = Record<string, unknown>
