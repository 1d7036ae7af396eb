import type { KeyObject } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import {
  computeThumbprint,
  loadCertificate,
} from '../certificates/thumbprint.ts'
import {
  CertificateError,
  errorMessage,
  KeyError,
  ProviderError,
  TokenIssuerError,
} from '../plumbing/errors.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { getTokenEndpoint } from '../providers/microsoft-config.ts'
import {
  buildClientAssertion,
  type ClientAssertion,
} from '../tokens/client-assertion.ts'
import { type Clock, systemClock } from '../tokens/clock.ts'
import {
  createRsaSha256Signer,
  loadRsaPrivateKey,
} from '../tokens/signer.ts'
import { exchangeClientAssertion } from './token-exchange.ts'
import type { TokenResponse } from './types/token-response.ts'

export interface IssueTokenRequest {
  tenantId: string
  clientId: string
  scope: string
  certificatePath: string
  privateKeyPath: string
  privateKeyPassphrase?: string
  authorityHost?: string
  timeoutMs?: number
}

export interface IssueTokenDependencies {
  clock?: Clock
  readFile?: (path: string) => Promise<Buffer>
}

export interface SignedClientAssertion extends ClientAssertion {
  tokenEndpoint: string
}

const readFileOrThrow = async (
  read: (path: string) => Promise<Buffer>,
  path: string,
  toError: (message: string, options: { cause: unknown }) => Error,
  label: string,
): Promise<Buffer> => {
  try {
    return await read(path)
  } catch (error) {
    throw toError(
      `${label} file ${path} could not be read: ${errorMessage(error)}`,
      { cause: error },
    )
  }
}

/**
 * Certificate thumbprint, then key, then a signed assertion. The private key
 * is loaded and matched against the certificate before anything touches the
 * network; its PEM buffer is zeroed once the key object exists.
 */
export const createSignedAssertion = async (
  request: IssueTokenRequest,
  {
    clock = systemClock,
    readFile: read = (path) => readFile(path),
  }: IssueTokenDependencies = {},
): Promise<SignedClientAssertion> => {
  const certificateBytes = await readFileOrThrow(
    read,
    request.certificatePath,
    (message, options) => new CertificateError(message, options),
    'Certificate',
  )
  const certificate = loadCertificate(certificateBytes)
  const x5t = computeThumbprint(certificate)

  const keyBytes = await readFileOrThrow(
    read,
    request.privateKeyPath,
    (message, options) => new KeyError(message, options),
    'Private key',
  )
  let key: KeyObject
  try {
    key = loadRsaPrivateKey(keyBytes, request.privateKeyPassphrase)
  } finally {
    keyBytes.fill(0)
  }
  if (!certificate.checkPrivateKey(key)) {
    throw new KeyError(
      `Private key ${request.privateKeyPath} does not match certificate ${request.certificatePath}`,
    )
  }

  const { assertion, header, claims } = buildClientAssertion({
    x5t,
    tenantId: request.tenantId,
    clientId: request.clientId,
    sign: createRsaSha256Signer(key),
    clock,
    authorityHost: request.authorityHost,
  })

  logSecurityEvent({
    event: 'assertion_created',
    client_id: request.clientId,
    tenant_id: request.tenantId,
    jti: claims.jti,
    x5t,
    expires_at: claims.exp,
  })

  return {
    assertion,
    header,
    claims,
    tokenEndpoint: getTokenEndpoint(request.tenantId, request.authorityHost),
  }
}

const providerErrorCode = (error: ProviderError): string | undefined =>
  typeof error.body !== 'string' && typeof error.body.error === 'string'
    ? error.body.error
    : undefined

/**
 * Issue one access token: sign a client assertion and exchange it at the
 * tenant's token endpoint. The provider's response is returned unmodified.
 */
export const issueAccessToken = async (
  request: IssueTokenRequest,
  dependencies: IssueTokenDependencies = {},
): Promise<TokenResponse> => {
  try {
    const { assertion, tokenEndpoint } = await createSignedAssertion(
      request,
      dependencies,
    )
    const response = await exchangeClientAssertion({
      tokenEndpoint,
      clientId: request.clientId,
      scope: request.scope,
      clientAssertion: assertion,
      timeoutMs: request.timeoutMs,
    })

    logSecurityEvent({
      event: 'token_issued',
      client_id: request.clientId,
      tenant_id: request.tenantId,
      scope: request.scope,
      ...(typeof response.token_type === 'string' && {
        token_type: response.token_type,
      }),
      ...(typeof response.expires_in === 'number' && {
        expires_in: response.expires_in,
      }),
    })
    return response
  } catch (error) {
    if (error instanceof TokenIssuerError) {
      logSecurityEvent({
        event: 'token_request_failed',
        client_id: request.clientId,
        tenant_id: request.tenantId,
        error_kind: error.kind,
        ...(error instanceof ProviderError && {
          status: error.status,
          error: providerErrorCode(error),
        }),
      })
    }
    throw error
  }
}
