import { readFile } from 'node:fs/promises'
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from 'vitest'
import {
  fixturePath,
  readFixture,
  TEST_CERT_X5T,
} from '../../__fixtures__/index.ts'
import { loadCertificate } from '../../certificates/thumbprint.ts'
import {
  CertificateError,
  KeyError,
  ProviderError,
} from '../../plumbing/errors.ts'
import { fixedClock } from '../../tokens/clock.ts'
import { parseJwt, verifyJwtSignature } from '../../tokens/jwt.ts'
import {
  createSignedAssertion,
  type IssueTokenRequest,
  issueAccessToken,
} from '../issue-token.ts'

const NOW = 1_700_000_000
const JTI = '3b241101-e2bb-4255-8caf-4136c566a962'
const clock = fixedClock(NOW, JTI)

const baseRequest: IssueTokenRequest = {
  tenantId: 'tenant-xyz',
  clientId: 'abc-123',
  scope: 'https://graph.microsoft.com/.default',
  certificatePath: fixturePath('test-cert.pem'),
  privateKeyPath: fixturePath('test-key.pem'),
}

const tokenBody = {
  token_type: 'Bearer',
  expires_in: 3599,
  ext_expires_in: 3599,
  access_token: 'opaque-token-value',
}

const stubFetch = (status: number, body: unknown) => {
  const fetchMock = vi.fn<typeof fetch>(
    async () => new Response(JSON.stringify(body), { status }),
  )
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

const securityEvents = (spy: MockInstance<typeof console.error>): unknown[] =>
  spy.mock.calls
    .map(([entry]) => entry)
    .filter(
      (entry): entry is { security_event: unknown } =>
        typeof entry === 'object' && entry !== null && 'security_event' in entry,
    )
    .map((entry) => entry.security_event)

describe('issueAccessToken', () => {
  let logSpy: MockInstance<typeof console.error>

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    logSpy.mockRestore()
  })

  it('should return the provider response for a signed assertion', async () => {
    stubFetch(200, tokenBody)

    const response = await issueAccessToken(baseRequest, { clock })

    expect(response).toEqual(tokenBody)
  })

  it('should send an assertion signed by the certificate key', async () => {
    const fetchMock = stubFetch(200, tokenBody)

    await issueAccessToken(baseRequest, { clock })

    const [url, init] = fetchMock.mock.calls[0]
    expect(String(url)).toBe(
      'https://login.microsoftonline.com/tenant-xyz/oauth2/v2.0/token',
    )
    const form = new URLSearchParams(String(init?.body))
    const assertion = form.get('client_assertion') ?? ''
    const { publicKey } = loadCertificate(readFixture('test-cert.pem'))

    expect(verifyJwtSignature(assertion, publicKey)).toBe(true)
    expect(parseJwt(assertion).header).toEqual({
      alg: 'RS256',
      typ: 'JWT',
      x5t: TEST_CERT_X5T,
    })
    expect(parseJwt(assertion).payload).toEqual({
      aud: 'https://login.microsoftonline.com/tenant-xyz/oauth2/v2.0/token',
      nbf: NOW,
      exp: NOW + 300,
      jti: JTI,
      iss: 'abc-123',
      sub: 'abc-123',
    })
    expect(form.get('client_id')).toBe('abc-123')
  })

  it('should fail with KeyError before any network call for an unparsable key', async () => {
    const fetchMock = stubFetch(200, tokenBody)

    await expect(
      issueAccessToken(
        { ...baseRequest, privateKeyPath: fixturePath('malformed-key.pem') },
        { clock },
      ),
    ).rejects.toThrow(KeyError)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('should fail with CertificateError when the certificate is missing', async () => {
    const fetchMock = stubFetch(200, tokenBody)
    const missing = fixturePath('missing-cert.pem')

    const attempt = issueAccessToken(
      { ...baseRequest, certificatePath: missing },
      { clock },
    )

    await expect(attempt).rejects.toThrow(CertificateError)
    await expect(attempt).rejects.toThrow(
      `Certificate file ${missing} could not be read: `,
    )
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('should fail with KeyError when the key file is missing', async () => {
    stubFetch(200, tokenBody)

    await expect(
      issueAccessToken(
        { ...baseRequest, privateKeyPath: fixturePath('missing-key.pem') },
        { clock },
      ),
    ).rejects.toThrow(KeyError)
  })

  it('should reject a key that does not belong to the certificate', async () => {
    const fetchMock = stubFetch(200, tokenBody)
    const keyPath = fixturePath('weak-key.pem')

    await expect(
      issueAccessToken({ ...baseRequest, privateKeyPath: keyPath }, { clock }),
    ).rejects.toThrow(
      `Private key ${keyPath} does not match certificate ${baseRequest.certificatePath}`,
    )
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('should load an encrypted key with its passphrase', async () => {
    stubFetch(200, tokenBody)

    const response = await issueAccessToken(
      {
        ...baseRequest,
        privateKeyPath: fixturePath('encrypted-key.pem'),
        privateKeyPassphrase: 'test-passphrase',
      },
      { clock },
    )

    expect(response.access_token).toBe('opaque-token-value')
  })

  it('should surface provider rejections as ProviderError', async () => {
    stubFetch(400, { error: 'invalid_client' })

    await expect(issueAccessToken(baseRequest, { clock })).rejects.toThrow(
      ProviderError,
    )
    expect(securityEvents(logSpy)).toContainEqual({
      event: 'token_request_failed',
      client_id: 'abc-123',
      tenant_id: 'tenant-xyz',
      error_kind: 'provider',
      status: 400,
      error: 'invalid_client',
    })
  })

  it('should log issuance without secrets', async () => {
    const fetchMock = stubFetch(200, tokenBody)

    await issueAccessToken(baseRequest, { clock })

    const assertion =
      new URLSearchParams(String(fetchMock.mock.calls[0][1]?.body)).get(
        'client_assertion',
      ) ?? ''
    expect(securityEvents(logSpy)).toEqual([
      {
        event: 'assertion_created',
        client_id: 'abc-123',
        tenant_id: 'tenant-xyz',
        jti: JTI,
        x5t: TEST_CERT_X5T,
        expires_at: NOW + 300,
      },
      {
        event: 'token_issued',
        client_id: 'abc-123',
        tenant_id: 'tenant-xyz',
        scope: 'https://graph.microsoft.com/.default',
        token_type: 'Bearer',
        expires_in: 3599,
      },
    ])
    expect(JSON.stringify(logSpy.mock.calls)).not.toContain(assertion)
    expect(JSON.stringify(logSpy.mock.calls)).not.toContain(
      'opaque-token-value',
    )
  })
})

describe('createSignedAssertion', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should zero the private key buffer after loading it', async () => {
    const buffers: Buffer[] = []
    const read = async (path: string): Promise<Buffer> => {
      const bytes = await readFile(path)
      buffers.push(bytes)
      return bytes
    }

    const signed = await createSignedAssertion(baseRequest, {
      clock,
      readFile: read,
    })

    const [certificateBytes, keyBytes] = buffers
    expect(signed.assertion.split('.')).toHaveLength(3)
    expect(keyBytes.every((byte) => byte === 0)).toBe(true)
    expect(certificateBytes.every((byte) => byte === 0)).toBe(false)
  })

  it('should return the token endpoint the assertion is bound to', async () => {
    const signed = await createSignedAssertion(
      { ...baseRequest, authorityHost: 'https://login.microsoftonline.us' },
      { clock },
    )

    expect(signed.tokenEndpoint).toBe(
      'https://login.microsoftonline.us/tenant-xyz/oauth2/v2.0/token',
    )
    expect(signed.claims.aud).toBe(signed.tokenEndpoint)
  })

  it('should zero the key buffer even when the key is rejected', async () => {
    const buffers: Buffer[] = []
    const read = async (path: string): Promise<Buffer> => {
      const bytes = await readFile(path)
      buffers.push(bytes)
      return bytes
    }

    await expect(
      createSignedAssertion(
        { ...baseRequest, privateKeyPath: fixturePath('ec-key.pem') },
        { clock, readFile: read },
      ),
    ).rejects.toThrow('Private key must be an RSA key, got ec')
    expect(buffers[1].every((byte) => byte === 0)).toBe(true)
  })
})
