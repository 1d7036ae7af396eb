export interface IssuerConfig {
  tenantId: string
  clientId: string
  scope: string
  certificatePath: string
  privateKeyPath: string
  privateKeyPassphrase?: string
  authorityHost: string
  timeoutMs: number
}

/**
 * Values supplied on the command line. They win over the environment.
 */
export interface IssuerConfigOverrides {
  tenantId?: string
  clientId?: string
  scope?: string
  certificatePath?: string
  privateKeyPath?: string
  authorityHost?: string
  timeoutMs?: string
}
