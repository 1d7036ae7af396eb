import { parseArgs } from 'node:util'
import { getIssuerConfig } from '../config/issuer-config.ts'
import {
  createSignedAssertion,
  type IssueTokenDependencies,
  issueAccessToken,
} from '../flows/issue-token.ts'
import { ProviderError, TokenIssuerError } from '../plumbing/errors.ts'

export interface CliOutput {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_PROVIDER_ERROR = 2
export const EXIT_USAGE = 64

export const USAGE = `Usage: cert-token [options]

Request an access token with a certificate-signed client assertion.
Options override the AZURE_* environment variables (a .env file is read).

  --tenant <id>        Directory (tenant) id          AZURE_TENANT_ID
  --client-id <id>     Application (client) id        AZURE_CLIENT_ID
  --scope <scope>      Requested scope                AZURE_SCOPE
  --cert <path>        X.509 certificate, PEM or DER  AZURE_CERTIFICATE_PATH
  --key <path>         RSA private key, PEM           AZURE_PRIVATE_KEY_PATH
  --authority <url>    Authority host                 AZURE_AUTHORITY_HOST
  --timeout <ms>       Token request timeout          TOKEN_REQUEST_TIMEOUT_MS
  --assertion-only     Print the signed client assertion and exit
  -h, --help           Show this help
`

const defaultOutput: CliOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      tenant: { type: 'string' },
      'client-id': { type: 'string' },
      scope: { type: 'string' },
      cert: { type: 'string' },
      key: { type: 'string' },
      authority: { type: 'string' },
      timeout: { type: 'string' },
      'assertion-only': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })

const exitCodeFor = (error: TokenIssuerError): number => {
  switch (error.kind) {
    case 'provider':
      return EXIT_PROVIDER_ERROR
    case 'config':
      return EXIT_USAGE
    default:
      return EXIT_FAILURE
  }
}

/**
 * Runs the command and returns the process exit code. Errors other than
 * TokenIssuerError propagate to the caller.
 */
export const runCli = async (
  argv: string[],
  output: CliOutput = defaultOutput,
  dependencies: IssueTokenDependencies = {},
): Promise<number> => {
  let values: ReturnType<typeof parseCliArgs>['values']
  try {
    values = parseCliArgs(argv).values
  } catch (error) {
    if (error instanceof TypeError) {
      output.stderr(`${error.message}\n\n${USAGE}`)
      return EXIT_USAGE
    }
    throw error
  }

  if (values.help) {
    output.stdout(USAGE)
    return EXIT_OK
  }

  try {
    const config = getIssuerConfig({
      tenantId: values.tenant,
      clientId: values['client-id'],
      scope: values.scope,
      certificatePath: values.cert,
      privateKeyPath: values.key,
      authorityHost: values.authority,
      timeoutMs: values.timeout,
    })

    if (values['assertion-only']) {
      const { assertion } = await createSignedAssertion(config, dependencies)
      output.stdout(`${assertion}\n`)
      return EXIT_OK
    }

    const response = await issueAccessToken(config, dependencies)
    output.stdout(`${JSON.stringify(response, null, 2)}\n`)
    return EXIT_OK
  } catch (error) {
    if (error instanceof ProviderError) {
      // The provider's error body is the command's output
      const body =
        typeof error.body === 'string'
          ? error.body
          : JSON.stringify(error.body, null, 2)
      output.stdout(`${body}\n`)
      output.stderr(`${error.name}: ${error.message}\n`)
      return exitCodeFor(error)
    }
    if (error instanceof TokenIssuerError) {
      output.stderr(`${error.name}: ${error.message}\n`)
      return exitCodeFor(error)
    }
    throw error
  }
}
