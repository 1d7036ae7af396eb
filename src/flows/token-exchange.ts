import {
  errorMessage,
  ProviderError,
  type ProviderErrorBody,
  TransportError,
} from '../plumbing/errors.ts'
import { isRecord } from '../plumbing/is-record.ts'
import { CLIENT_ASSERTION_TYPE } from '../providers/microsoft-config.ts'
import type { TokenResponse } from './types/token-response.ts'

export const DEFAULT_TOKEN_REQUEST_TIMEOUT_MS = 30_000

export interface ExchangeClientAssertionInput {
  tokenEndpoint: string
  clientId: string
  scope: string
  clientAssertion: string
  timeoutMs?: number
}

const isTimeout = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'name' in error &&
  (error.name === 'TimeoutError' || error.name === 'AbortError')

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Build the form body for a client-credentials request authenticated with a
 * JWT-bearer client assertion.
 */
export const createTokenRequestBody = ({
  clientId,
  scope,
  clientAssertion,
}: Pick<
  ExchangeClientAssertionInput,
  'clientId' | 'scope' | 'clientAssertion'
>): URLSearchParams =>
  new URLSearchParams({
    client_id: clientId,
    scope,
    client_assertion_type: CLIENT_ASSERTION_TYPE,
    client_assertion: clientAssertion,
    grant_type: 'client_credentials',
  })

/**
 * POST the client assertion to the token endpoint, once.
 * 2xx: the JSON body as sent. Any other status, redirects included:
 * ProviderError with the provider's body.
 * Network failures and timeouts: TransportError. No retries.
 */
export const exchangeClientAssertion = async ({
  tokenEndpoint,
  clientId,
  scope,
  clientAssertion,
  timeoutMs = DEFAULT_TOKEN_REQUEST_TIMEOUT_MS,
}: ExchangeClientAssertionInput): Promise<TokenResponse> => {
  let endpoint: URL
  try {
    endpoint = new URL(tokenEndpoint)
  } catch (error) {
    throw new TransportError(
      'invalid_endpoint',
      `Token endpoint is not a valid URL: ${tokenEndpoint}`,
      { cause: error },
    )
  }
  if (endpoint.protocol !== 'https:') {
    throw new TransportError(
      'insecure_endpoint',
      `Token endpoint must use https: ${tokenEndpoint}`,
    )
  }

  let status: number
  let ok: boolean
  let text: string
  try {
    // The signal also bounds reading the body
    const response = await fetch(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: createTokenRequestBody({ clientId, scope, clientAssertion }),
      // Redirects come back as responses and are never followed
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs),
    })
    status = response.status
    ok = response.ok
    text = await response.text()
  } catch (error) {
    if (isTimeout(error)) {
      throw new TransportError(
        'timeout',
        `Token request timed out after ${timeoutMs} ms`,
        { cause: error },
      )
    }
    throw new TransportError(
      'network',
      `Token request failed: ${errorMessage(error)}`,
      { cause: error },
    )
  }

  const body = parseJson(text)

  if (!ok) {
    const errorBody: ProviderErrorBody = isRecord(body) ? body : text
    throw new ProviderError(status, errorBody)
  }

  if (!isRecord(body)) {
    throw new TransportError(
      'invalid_response',
      `Token endpoint returned status ${status} with a body that is not a JSON object`,
    )
  }
  return body
}
