export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com'

export const MICROSOFT_API_VERSION = 'v2.0'

/** Default resource scope for app-only tokens */
export const DEFAULT_SCOPE = 'https://graph.microsoft.com/.default'

export const CLIENT_ASSERTION_TYPE =
  'urn:ietf:params:oauth:client-assertion-type:jwt-bearer'

/**
 * Token endpoint for a tenant. Also the `aud` of every client assertion.
 */
export const getTokenEndpoint = (
  tenantId: string,
  authorityHost: string = DEFAULT_AUTHORITY_HOST,
): string =>
  `${authorityHost.replace(/\/+$/, '')}/${encodeURIComponent(tenantId)}/oauth2/${MICROSOFT_API_VERSION}/token`
