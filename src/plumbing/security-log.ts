/**
 * Security and audit logging for token issuance.
 * Never logs private keys, client assertions or access tokens.
 */

import type { TokenIssuerErrorKind } from './errors.ts'
import { log } from './logger.ts'

export interface AssertionCreatedEvent {
  event: 'assertion_created'
  client_id: string
  tenant_id: string
  jti: string
  x5t: string
  expires_at: number
}

export interface TokenIssuedEvent {
  event: 'token_issued'
  client_id: string
  tenant_id: string
  scope: string
  token_type?: string
  expires_in?: number
}

export interface TokenRequestFailedEvent {
  event: 'token_request_failed'
  client_id: string
  tenant_id: string
  error_kind: TokenIssuerErrorKind
  /** HTTP status, when the provider answered */
  status?: number
  /** Provider error code such as invalid_client */
  error?: string
}

export type SecurityEvent =
  | AssertionCreatedEvent
  | TokenIssuedEvent
  | TokenRequestFailedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
