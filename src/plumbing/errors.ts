/**
 * Error types for token issuance. Every failure is fatal to the invocation;
 * `kind` lets the caller map errors to exit codes without instanceof chains.
 */

export type TokenIssuerErrorKind =
  | 'certificate'
  | 'key'
  | 'signing'
  | 'transport'
  | 'provider'
  | 'config'

export class TokenIssuerError extends Error {
  constructor(
    public readonly kind: TokenIssuerErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'TokenIssuerError'
  }
}

/** Certificate file unreadable, or not parseable as X.509. */
export class CertificateError extends TokenIssuerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('certificate', message, options)
    this.name = 'CertificateError'
  }
}

/** Private key unreadable, malformed, still encrypted, or not RSA. */
export class KeyError extends TokenIssuerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('key', message, options)
    this.name = 'KeyError'
  }
}

export class SigningError extends TokenIssuerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('signing', message, options)
    this.name = 'SigningError'
  }
}

export type TransportFailureReason =
  | 'network'
  | 'timeout'
  | 'invalid_response'
  | 'insecure_endpoint'
  | 'invalid_endpoint'

export class TransportError extends TokenIssuerError {
  constructor(
    public readonly reason: TransportFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('transport', message, options)
    this.name = 'TransportError'
  }
}

/**
 * Error body as sent by the identity provider. Usually `{error,
 * error_description}`, plus trace and correlation ids; kept verbatim.
 */
export type ProviderErrorBody = Record<string, unknown> | string

/** Non-2xx response from the token endpoint. */
export class ProviderError extends TokenIssuerError {
  constructor(
    public readonly status: number,
    public readonly body: ProviderErrorBody,
  ) {
    super('provider', describeProviderError(status, body))
    this.name = 'ProviderError'
  }
}

export class ConfigError extends TokenIssuerError {
  constructor(public readonly problems: string[]) {
    super('config', `Configuration is invalid:\n${problems.join('\n')}`)
    this.name = 'ConfigError'
  }
}

const describeProviderError = (
  status: number,
  body: ProviderErrorBody,
): string => {
  if (typeof body === 'string') {
    return body
      ? `Token request failed with status ${status}: ${body}`
      : `Token request failed with status ${status}`
  }
  const { error, error_description: description } = body
  const code = typeof error === 'string' ? error : 'unknown_error'
  return typeof description === 'string'
    ? `Token request failed with status ${status}: ${code} - ${description}`
    : `Token request failed with status ${status}: ${code}`
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
