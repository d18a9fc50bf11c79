/**
 * Authenticator
 *
 * A request proves knowledge of a password by sending
 * digest(password ++ salt) together with the salt. The digest that matches
 * becomes the connection's encryption key.
 */

import { randomBytes, timingSafeEqual } from "crypto";
import { HashAlgorithm } from "./constants.js";
import { decodeHex, digest, encodeHex } from "./crypto.js";
import { NotAuthorizedError } from "./errors.js";
import type { AuthSpec } from "./types.js";

export const SALT_LENGTH = 16;

/**
 * Derive the key for one password candidate
 */
export function deriveKey(
  algorithm: HashAlgorithm,
  password: string,
  salt: Buffer
): Buffer {
  return digest(algorithm, Buffer.from(password, "utf8"), salt);
}

/**
 * Find the configured password the auth spec was built from
 *
 * @returns The matching key, or undefined if no password matches
 */
export function findMatchingKey(
  passwords: readonly string[],
  auth: AuthSpec
): Buffer | undefined {
  const expected = decodeHex(auth.hash);
  const salt = decodeHex(auth.salt);

  if (!expected || !salt || expected.length === 0) {
    throw new NotAuthorizedError("Unable to parse hash");
  }

  for (const password of passwords) {
    const key = deriveKey(auth.algorithm, password, salt);
    if (key.length === expected.length && timingSafeEqual(key, expected)) {
      return key;
    }
  }

  return undefined;
}

/**
 * Build an auth spec for a password (sender side)
 */
export function createAuthSpec(
  password: string,
  algorithm: HashAlgorithm = HashAlgorithm.SHA256,
  salt: Buffer = randomBytes(SALT_LENGTH)
): { auth: AuthSpec; key: Buffer } {
  const key = deriveKey(algorithm, password, salt);
  return {
    auth: { algorithm, hash: encodeHex(key), salt: encodeHex(salt) },
    key,
  };
}
