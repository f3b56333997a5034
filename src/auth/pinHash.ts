/**
 * PIN hashing.
 *
 * New hashes use salted scrypt and carry their own parameters:
 *   scrypt$<N>$<r>$<p>$<salt hex>$<key hex>
 * Files written by earlier versions hold a bare SHA-256 hex digest; those still
 * verify, and `needsRehash` tells the caller to upgrade them.
 */
import { createHash, randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import { InvalidPinError } from '../errors.js';

export interface ScryptParams {
  N: number;
  r: number;
  p: number;
  keyLength: number;
  saltLength: number;
}

export const DEFAULT_SCRYPT: ScryptParams = {
  N: 16384,
  r: 8,
  p: 1,
  keyLength: 32,
  saltLength: 16,
};

const SCHEME = 'scrypt';
// Stored parameters beyond these are treated as unrecognised rather than run
const MAX_SCRYPT_MEMORY = 64 * 1024 * 1024;
const MAX_PARALLELISM = 16;
const LEGACY_SHA256 = /^[0-9a-f]{64}$/i;
const HEX = /^[0-9a-f]+$/i;

interface ParsedHash {
  N: number;
  r: number;
  p: number;
  salt: Buffer;
  key: Buffer;
}

function parseScryptHash(stored: string): ParsedHash | null {
  const parts = stored.split('$');
  if (parts.length !== 6 || parts[0] !== SCHEME) return null;
  const [N, r, p] = parts.slice(1, 4).map(Number);
  const [saltHex, keyHex] = [parts[4], parts[5]];
  if (![N, r, p].every((n) => Number.isSafeInteger(n) && n > 0)) return null;
  if (!isUsableCost(N, r, p)) return null;
  if (!HEX.test(saltHex) || !HEX.test(keyHex) || keyHex.length % 2 !== 0) return null;
  return { N, r, p, salt: Buffer.from(saltHex, 'hex'), key: Buffer.from(keyHex, 'hex') };
}

/** N a power of two above 1, memory within bounds */
function isUsableCost(N: number, r: number, p: number): boolean {
  return N > 1 && (N & (N - 1)) === 0 && 128 * N * r <= MAX_SCRYPT_MEMORY && p <= MAX_PARALLELISM;
}

export function hashPin(pin: string, params: ScryptParams = DEFAULT_SCRYPT): string {
  if (pin === '') {
    throw new InvalidPinError();
  }
  const salt = randomBytes(params.saltLength);
  const key = scryptSync(pin, salt, params.keyLength, {
    N: params.N,
    r: params.r,
    p: params.p,
    maxmem: 2 * MAX_SCRYPT_MEMORY,
  });
  return [SCHEME, params.N, params.r, params.p, salt.toString('hex'), key.toString('hex')].join('$');
}

export function verifyPin(attempt: string, stored: string): boolean {
  if (LEGACY_SHA256.test(stored)) {
    const digest = createHash('sha256').update(attempt, 'utf8').digest();
    return timingSafeEqual(digest, Buffer.from(stored, 'hex'));
  }

  const parsed = parseScryptHash(stored);
  if (!parsed) return false;
  const derived = scryptSync(attempt, parsed.salt, parsed.key.length, {
    N: parsed.N,
    r: parsed.r,
    p: parsed.p,
    maxmem: 2 * MAX_SCRYPT_MEMORY,
  });
  return timingSafeEqual(derived, parsed.key);
}

/** True when the stored hash is legacy or weaker than the current parameters */
export function needsRehash(stored: string, params: ScryptParams = DEFAULT_SCRYPT): boolean {
  const parsed = parseScryptHash(stored);
  if (!parsed) return true;
  return parsed.N < params.N || parsed.r < params.r || parsed.p < params.p;
}
