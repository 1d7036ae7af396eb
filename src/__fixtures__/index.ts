import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

/**
 * Self-signed test certificate and keys. Test-only material, never used
 * against a real tenant.
 */
export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`./${name}`, import.meta.url))

export const readFixture = (name: string): Buffer =>
  readFileSync(fixturePath(name))

/** `openssl x509 -noout -fingerprint -sha1` of test-cert.pem */
export const TEST_CERT_SHA1_FINGERPRINT =
  '32:E8:81:98:A4:CA:AE:E4:DD:A5:D2:88:A2:0C:A4:4B:51:6F:F9:A4'

export const TEST_CERT_X5T = 'MuiBmKTKruTdpdKIogykS1Fv-aQ'

export const TEST_KEY_PASSPHRASE = 'test-passphrase'
