// Password hashing for stored accounts.
// Stored layout (versioned by prefix): scrypt$<N>$<r>$<p>$<salt b64>$<key b64>.
// Accounts created before salting store a bare 64-char SHA-256 hex digest;
// those still verify and are flagged for rehashing on the next successful login.
import crypto from 'node:crypto'

export interface ScryptParams {
  N: number
  r: number
  p: number
  keyLength: number
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = { N: 16384, r: 8, p: 1, keyLength: 64 }

const SALT_BYTES = 16
const SCRYPT_PREFIX = 'scrypt'
const LEGACY_SHA256 = /^[0-9a-f]{64}$/

export interface PasswordCheck {
  valid: boolean
  needsRehash: boolean
}

export function derivePasswordKey(password: string, salt: Buffer, params: ScryptParams = DEFAULT_SCRYPT_PARAMS): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(
      password.normalize('NFC'),
      salt,
      params.keyLength,
      { N: params.N, r: params.r, p: params.p, maxmem: 256 * params.N * params.r },
      (err, key) => (err ? reject(err) : resolve(key))
    )
  })
}

export async function hashPassword(password: string, params: ScryptParams = DEFAULT_SCRYPT_PARAMS): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTES)
  const key = await derivePasswordKey(password, salt, params)
  return [SCRYPT_PREFIX, params.N, params.r, params.p, salt.toString('base64'), key.toString('base64')].join('$')
}

export function legacySha256(password: string): string {
  return crypto.createHash('sha256').update(password, 'utf8').digest('hex')
}

function safeEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}

type ParsedHash = { salt: Buffer; key: Buffer; params: ScryptParams }

function parseScryptHash(stored: string): ParsedHash | null {
  const parts = stored.split('$')
  if (parts.length !== 6 || parts[0] !== SCRYPT_PREFIX) return null
  const [, n, r, p, salt, key] = parts
  const params = { N: Number(n), r: Number(r), p: Number(p) }
  if (!Number.isInteger(params.N) || !Number.isInteger(params.r) || !Number.isInteger(params.p)) return null
  const keyBuffer = Buffer.from(key, 'base64')
  return {
    salt: Buffer.from(salt, 'base64'),
    key: keyBuffer,
    params: { ...params, keyLength: keyBuffer.length },
  }
}

export async function verifyPassword(stored: string, provided: string): Promise<PasswordCheck> {
  if (LEGACY_SHA256.test(stored)) {
    const valid = safeEqual(Buffer.from(stored, 'hex'), Buffer.from(legacySha256(provided), 'hex'))
    return { valid, needsRehash: valid }
  }

  const parsed = parseScryptHash(stored)
  if (!parsed || parsed.key.length === 0) {
    return { valid: false, needsRehash: false }
  }

  let candidate: Buffer
  try {
    candidate = await derivePasswordKey(provided, parsed.salt, parsed.params)
  } catch {
    // Stored parameters scrypt refuses, e.g. an N that is not a power of two.
    return { valid: false, needsRehash: false }
  }
  const valid = safeEqual(parsed.key, candidate)
  const { N, r, p } = DEFAULT_SCRYPT_PARAMS
  const outdated = parsed.params.N !== N || parsed.params.r !== r || parsed.params.p !== p
  return { valid, needsRehash: valid && outdated }
}
