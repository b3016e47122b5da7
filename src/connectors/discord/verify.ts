import { createPublicKey, verify, type KeyObject } from 'node:crypto'

/** DER prefix turning a raw 32-byte ed25519 key into an SPKI structure. */
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex')

export const SIGNATURE_HEADER = 'x-signature-ed25519'
export const TIMESTAMP_HEADER = 'x-signature-timestamp'

export function importPublicKey(publicKeyHex: string): KeyObject {
  const der = Buffer.concat([ED25519_SPKI_PREFIX, Buffer.from(publicKeyHex, 'hex')])
  return createPublicKey({ key: der, format: 'der', type: 'spki' })
}

/** Check Discord's ed25519 signature over `timestamp + body`. */
export function verifyInteractionSignature(
  publicKey: KeyObject | string,
  signatureHex: string,
  timestamp: string,
  body: string,
): boolean {
  if (!/^[0-9a-fA-F]{128}$/.test(signatureHex) || !timestamp) return false

  const key = typeof publicKey === 'string' ? importPublicKey(publicKey) : publicKey
  return verify(null, Buffer.from(timestamp + body), key, Buffer.from(signatureHex, 'hex'))
}
