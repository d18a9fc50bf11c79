/**
 * Encryption Layer
 *
 * Symmetric CBC ciphers with PKCS#7 padding. Every call builds a fresh
 * cipher from the same key/IV pair; no state carries across blocks.
 */

import { createCipheriv, createDecipheriv, createHash } from "crypto";
import {
  CIPHER_PARAMS,
  DIGEST_NAMES,
  EncryptionAlgorithm,
  type CipherParams,
  type HashAlgorithm,
} from "./constants.js";
import { DecryptionError, InvalidRequestError } from "./errors.js";
import type { CipherSpec } from "./types.js";

/**
 * Strict hex decoding (even length, hex digits only)
 *
 * @returns Decoded bytes, or null if the input is not hex
 */
export function decodeHex(hex: string): Buffer | null {
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) {
    return null;
  }
  return Buffer.from(hex, "hex");
}

export function encodeHex(bytes: Buffer): string {
  return bytes.toString("hex").toUpperCase();
}

/**
 * Digest the concatenation of all parts
 */
export function digest(algorithm: HashAlgorithm, ...parts: Buffer[]): Buffer {
  const hash = createHash(DIGEST_NAMES[algorithm]);
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
}

/**
 * Check key and IV sizes against the cipher
 */
function resolveCipher(
  algorithm: Exclude<EncryptionAlgorithm, EncryptionAlgorithm.NONE>,
  spec: CipherSpec
): { params: CipherParams; key: Buffer } {
  const params = CIPHER_PARAMS[algorithm];

  if (spec.key.length < params.keyLength) {
    throw new InvalidRequestError(
      `${algorithm} needs a ${params.keyLength}-byte key, got ${spec.key.length}`
    );
  }

  if (spec.iv.length !== params.ivLength) {
    throw new InvalidRequestError(
      `${algorithm} needs a ${params.ivLength}-byte IV, got ${spec.iv.length}`
    );
  }

  return { params, key: spec.key.subarray(0, params.keyLength) };
}

/**
 * Validate a cipher spec up front, before any block is read
 */
export function assertCipherUsable(spec: CipherSpec): void {
  const algorithm = spec.algorithm;
  if (algorithm !== EncryptionAlgorithm.NONE) {
    resolveCipher(algorithm, spec);
  }
}

/**
 * Decrypt one block
 *
 * @param what - Label used in the error message
 */
export function decrypt(spec: CipherSpec, data: Buffer, what = "block"): Buffer {
  const algorithm = spec.algorithm;
  if (algorithm === EncryptionAlgorithm.NONE) {
    return data;
  }

  const { params, key } = resolveCipher(algorithm, spec);

  try {
    const decipher = createDecipheriv(params.cipherName, key, spec.iv);
    return Buffer.concat([decipher.update(data), decipher.final()]);
  } catch (err) {
    throw new DecryptionError(
      `${what}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Encrypt one block (sender side)
 */
export function encrypt(spec: CipherSpec, data: Buffer): Buffer {
  const algorithm = spec.algorithm;
  if (algorithm === EncryptionAlgorithm.NONE) {
    return data;
  }

  const { params, key } = resolveCipher(algorithm, spec);
  const cipher = createCipheriv(params.cipherName, key, spec.iv);
  return Buffer.concat([cipher.update(data), cipher.final()]);
}
