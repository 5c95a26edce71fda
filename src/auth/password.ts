/**
 * ClinicDesk - Password Hashing
 *
 * New hashes use Node's scrypt in the format `scrypt:N:r:p:salt:hash`
 * (base64url). Databases carried over from the previous desktop release hold
 * unsalted SHA-256 hex digests; those still verify, and `needsRehash` tells the
 * login flow to replace them.
 */

import { createHash, randomBytes, scrypt, timingSafeEqual, type ScryptOptions } from "node:crypto";

const SALT_LENGTH = 16;
const KEY_LENGTH = 64;
const SCRYPT_PARAMS = { N: 16384, r: 8, p: 1 } as const;

const LEGACY_SHA256 = /^[0-9a-f]{64}$/;

export const MIN_PASSWORD_LENGTH = 6;

function deriveKey(
  password: string,
  salt: Buffer,
  keyLength: number,
  params: ScryptOptions,
): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    scrypt(password, salt, keyLength, params, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const hash = await deriveKey(password, salt, KEY_LENGTH, SCRYPT_PARAMS);
  const { N, r, p } = SCRYPT_PARAMS;
  return `scrypt:${N}:${r}:${p}:${salt.toString("base64url")}:${hash.toString("base64url")}`;
}

function verifyLegacy(password: string, storedHash: string): boolean {
  const actual = createHash("sha256").update(password).digest();
  return timingSafeEqual(actual, Buffer.from(storedHash, "hex"));
}

export async function verifyPassword(password: string, storedHash: string): Promise<boolean> {
  if (LEGACY_SHA256.test(storedHash)) return verifyLegacy(password, storedHash);

  const [scheme, nRaw, rRaw, pRaw, saltRaw, hashRaw, ...rest] = storedHash.split(":");
  if (scheme !== "scrypt" || rest.length > 0) return false;
  if (!nRaw || !rRaw || !pRaw || !saltRaw || !hashRaw) return false;

  const N = Number.parseInt(nRaw, 10);
  const r = Number.parseInt(rRaw, 10);
  const p = Number.parseInt(pRaw, 10);
  if (![N, r, p].every(Number.isInteger)) return false;

  const expected = Buffer.from(hashRaw, "base64url");
  const actual = await deriveKey(password, Buffer.from(saltRaw, "base64url"), expected.length, { N, r, p });
  return timingSafeEqual(actual, expected);
}

/** True when the stored hash predates the current scrypt parameters. */
export function needsRehash(storedHash: string): boolean {
  const { N, r, p } = SCRYPT_PARAMS;
  return !storedHash.startsWith(`scrypt:${N}:${r}:${p}:`);
}
