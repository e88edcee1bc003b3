/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import { createHash, randomBytes, randomInt } from 'node:crypto'
import type { PkcePair } from '../../types/auth'

const VERIFIER_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-._~'
const VERIFIER_LENGTH = 128

export function generateCodeVerifier() {
  let verifier = ''
  for (let i = 0; i < VERIFIER_LENGTH; i++) {
    verifier += VERIFIER_ALPHABET[randomInt(VERIFIER_ALPHABET.length)]
  }
  return verifier
}

/**
 * `S256` challenge of a verifier: URL-safe base64 of its SHA-256 digest, without padding.
 */
export function generateCodeChallenge(codeVerifier: string) {
  return createHash('sha256').update(codeVerifier, 'ascii').digest('base64url')
}

export function createPkcePair(): PkcePair {
  const codeVerifier = generateCodeVerifier()
  return { codeVerifier, codeChallenge: generateCodeChallenge(codeVerifier) }
}

/**
 * Opaque value sent with the authorize URL and expected back on the redirect.
 */
export function generateState() {
  return randomBytes(16).toString('hex')
}
