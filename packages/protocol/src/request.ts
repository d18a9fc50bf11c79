/**
 * Request Encoding (sender side)
 *
 * Plain requests are a request line followed by blank-line-terminated
 * header blocks. Encrypted requests carry all header blocks as one
 * ciphertext terminated by CRLF CRLF. Resource blocks follow in either
 * case; only their payload is encrypted.
 */

import { randomBytes } from "crypto";
import {
  CIPHER_PARAMS,
  EncryptionAlgorithm,
  HashAlgorithm,
  LINE_TERMINATOR,
  PROTOCOL_VERSION,
  Headers,
} from "./constants.js";
import { createAuthSpec } from "./auth.js";
import { encrypt } from "./crypto.js";
import { formatHeaders } from "./headers.js";
import { formatRequestLine } from "./requestLine.js";
import type { AuthSpec, CipherSpec, OutgoingRequest } from "./types.js";

export type EncodeOptions = {
  salt?: Buffer; // Fixed salt (tests); random otherwise
  iv?: Buffer; // Fixed IV (tests); random otherwise
};

/**
 * Encode a request for transmission
 */
export function encodeRequest(
  request: OutgoingRequest,
  options: EncodeOptions = {}
): Buffer {
  const algorithm = request.encryption ?? EncryptionAlgorithm.NONE;

  let auth: AuthSpec | undefined;
  let key: Buffer = Buffer.alloc(0);
  if (request.password !== undefined) {
    const created = createAuthSpec(
      request.password,
      request.hashAlgorithm ?? HashAlgorithm.SHA256,
      options.salt
    );
    auth = created.auth;
    key = created.key;
  } else if (algorithm !== EncryptionAlgorithm.NONE) {
    throw new Error("Encryption requires a password");
  }

  const iv =
    algorithm === EncryptionAlgorithm.NONE
      ? Buffer.alloc(0)
      : options.iv ?? randomBytes(CIPHER_PARAMS[algorithm].ivLength);
  const cipher: CipherSpec = { algorithm, iv, key };

  const line = formatRequestLine({
    version: PROTOCOL_VERSION,
    messageType: request.messageType,
    encryption: { algorithm, iv },
    auth,
  });

  const blocks = [request.headers, ...(request.notificationTypes ?? [])];
  if (request.notificationTypes && !request.headers.has(Headers.NOTIFICATIONS_COUNT)) {
    blocks[0] = new Map(request.headers).set(
      Headers.NOTIFICATIONS_COUNT,
      String(request.notificationTypes.length)
    );
  }

  const parts: Buffer[] = [Buffer.from(line + LINE_TERMINATOR, "utf8")];

  if (algorithm === EncryptionAlgorithm.NONE) {
    for (const block of blocks) {
      parts.push(Buffer.from(formatHeaders(block) + LINE_TERMINATOR, "utf8"));
    }
  } else {
    const plaintext = blocks.map(formatHeaders).join(LINE_TERMINATOR);
    parts.push(encrypt(cipher, Buffer.from(plaintext, "utf8")));
    parts.push(Buffer.from(LINE_TERMINATOR + LINE_TERMINATOR, "latin1"));
  }

  for (const resource of request.resources ?? []) {
    const payload = encrypt(cipher, resource.data);
    const headers = new Map<string, string>([
      [Headers.RESOURCE_IDENTIFIER, resource.identifier],
      [Headers.RESOURCE_LENGTH, String(payload.length)],
    ]);
    parts.push(Buffer.from(formatHeaders(headers) + LINE_TERMINATOR, "utf8"));
    parts.push(payload);
    // Senders commonly end the payload with two CRLFs
    parts.push(Buffer.from(LINE_TERMINATOR + LINE_TERMINATOR, "latin1"));
  }

  return Buffer.concat(parts);
}
