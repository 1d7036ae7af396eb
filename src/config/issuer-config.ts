import { DEFAULT_TOKEN_REQUEST_TIMEOUT_MS } from '../flows/token-exchange.ts'
import { ConfigError } from '../plumbing/errors.ts'
import { parsePositiveInteger } from '../plumbing/parse-number.ts'
import {
  DEFAULT_AUTHORITY_HOST,
  DEFAULT_SCOPE,
} from '../providers/microsoft-config.ts'
import type {
  IssuerConfig,
  IssuerConfigOverrides,
} from './types/issuer-config.ts'

const readEnv = (name: string): string | undefined => {
  const value = process.env[name]?.trim()
  return value ? value : undefined
}

const pick = (
  override: string | undefined,
  envName: string,
): string | undefined => override?.trim() || readEnv(envName)

const validateConfig = (
  config: IssuerConfig,
  timeoutValue: string | undefined,
): void => {
  const errors: string[] = []

  if (!config.tenantId) {
    errors.push('Tenant id must be set (AZURE_TENANT_ID or --tenant)')
  }
  if (!config.clientId) {
    errors.push('Client id must be set (AZURE_CLIENT_ID or --client-id)')
  }
  if (!config.certificatePath) {
    errors.push(
      'Certificate path must be set (AZURE_CERTIFICATE_PATH or --cert)',
    )
  }
  if (!config.privateKeyPath) {
    errors.push(
      'Private key path must be set (AZURE_PRIVATE_KEY_PATH or --key)',
    )
  }
  if (!config.authorityHost.startsWith('https://')) {
    errors.push('Authority host must be an https:// URL')
  }
  if (
    timeoutValue !== undefined &&
    parsePositiveInteger(timeoutValue, 0) === 0
  ) {
    errors.push(
      'Timeout must be a positive integer of milliseconds (TOKEN_REQUEST_TIMEOUT_MS or --timeout)',
    )
  }

  if (errors.length > 0) {
    throw new ConfigError(errors)
  }
}

/**
 * Resolve issuer settings from command-line overrides and the environment.
 * Every missing or invalid value is reported in a single ConfigError.
 */
export const getIssuerConfig = (
  overrides: IssuerConfigOverrides = {},
): IssuerConfig => {
  const timeoutValue = pick(overrides.timeoutMs, 'TOKEN_REQUEST_TIMEOUT_MS')
  const config: IssuerConfig = {
    tenantId: pick(overrides.tenantId, 'AZURE_TENANT_ID') ?? '',
    clientId: pick(overrides.clientId, 'AZURE_CLIENT_ID') ?? '',
    scope: pick(overrides.scope, 'AZURE_SCOPE') ?? DEFAULT_SCOPE,
    certificatePath:
      pick(overrides.certificatePath, 'AZURE_CERTIFICATE_PATH') ?? '',
    privateKeyPath:
      pick(overrides.privateKeyPath, 'AZURE_PRIVATE_KEY_PATH') ?? '',
    privateKeyPassphrase: readEnv('AZURE_PRIVATE_KEY_PASSPHRASE'),
    authorityHost:
      pick(overrides.authorityHost, 'AZURE_AUTHORITY_HOST') ??
      DEFAULT_AUTHORITY_HOST,
    timeoutMs: parsePositiveInteger(
      timeoutValue,
      DEFAULT_TOKEN_REQUEST_TIMEOUT_MS,
    ),
  }

  validateConfig(config, timeoutValue)
  return config
}
