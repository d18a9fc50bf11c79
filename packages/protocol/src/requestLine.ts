/**
 * Request Line Parsing
 *
 * GNTP/<version> <messageType> <encryptionAlgorithm>[:<ivHex>][ <hashAlgorithm>:<keyHash>.<salt>]
 */

import {
  EncryptionAlgorithm,
  FIELD_DELIMITER,
  HashAlgorithm,
  MessageType,
  PROTOCOL_NAME,
  PROTOCOL_VERSION,
} from "./constants.js";
import { decodeHex, encodeHex } from "./crypto.js";
import {
  InvalidRequestError,
  NotAuthorizedError,
  UnknownProtocolError,
  UnsupportedVersionError,
} from "./errors.js";
import type { AuthSpec, EncryptionSpec, RequestLine } from "./types.js";

/**
 * Split "name:rest" on the first colon
 */
function splitOnce(field: string, separator: string): [string, string | undefined] {
  const index = field.indexOf(separator);
  if (index === -1) {
    return [field, undefined];
  }
  return [field.slice(0, index), field.slice(index + 1)];
}

function parseEncryption(field: string): EncryptionSpec {
  const [name, ivHex] = splitOnce(field, ":");

  const algorithm = Object.values(EncryptionAlgorithm).find((value) => value === name);
  if (!algorithm) {
    throw new InvalidRequestError(`Unsupported encryption type: ${name}`);
  }

  const iv = decodeHex(ivHex ?? "");
  if (!iv) {
    throw new InvalidRequestError(`Invalid IV: ${ivHex}`);
  }

  return { algorithm, iv };
}

function parseAuth(field: string): AuthSpec {
  const parts = field.split(":");
  if (parts.length !== 2) {
    throw new NotAuthorizedError("Unable to parse hash");
  }

  const [name, hashDotSalt] = parts;
  const algorithm = Object.values(HashAlgorithm).find((value) => value === name);
  if (!algorithm) {
    throw new InvalidRequestError(`Unsupported hash type: ${name}`);
  }

  const dot = hashDotSalt.indexOf(".");
  if (dot < 1 || dot === hashDotSalt.length - 1) {
    throw new NotAuthorizedError("Unable to parse hash");
  }

  return {
    algorithm,
    hash: hashDotSalt.slice(0, dot),
    salt: hashDotSalt.slice(dot + 1),
  };
}

/**
 * Parse the first line of a request
 *
 * Protocol name and version are checked before anything else so that a
 * foreign or newer peer is told so rather than getting INVALID_REQUEST.
 */
export function parseRequestLine(input: string): RequestLine {
  // Line can end with extraneous whitespace
  const fields = input.trim().split(FIELD_DELIMITER);
  if (fields.length < 3 || fields.length > 4) {
    throw new InvalidRequestError(
      `Expected 3 or 4 fields, found ${fields.length} fields`
    );
  }

  const [protocolField, typeField, encryptionField] = fields;
  const authField = fields.length === 4 ? fields[3] : undefined;

  const protocolAndVersion = protocolField.split("/");
  if (protocolAndVersion.length !== 2) {
    throw new InvalidRequestError(
      `Expected ${PROTOCOL_NAME}/${PROTOCOL_VERSION} protocol header`
    );
  }

  const [protocol, version] = protocolAndVersion;
  if (protocol !== PROTOCOL_NAME) {
    throw new UnknownProtocolError(protocol);
  }
  if (version !== PROTOCOL_VERSION) {
    throw new UnsupportedVersionError(version);
  }

  const messageType = Object.values(MessageType).find((value) => value === typeField);
  if (!messageType) {
    throw new InvalidRequestError(`Unknown message type: ${typeField}`);
  }

  return {
    version,
    messageType,
    encryption: parseEncryption(encryptionField),
    auth: authField === undefined ? undefined : parseAuth(authField),
  };
}

/**
 * Format a request line (sender side)
 */
export function formatRequestLine(line: RequestLine): string {
  let encryption: string = line.encryption.algorithm;
  if (line.encryption.iv.length > 0) {
    encryption += `:${encodeHex(line.encryption.iv)}`;
  }

  const fields = [`${PROTOCOL_NAME}/${line.version}`, line.messageType, encryption];
  if (line.auth) {
    fields.push(`${line.auth.algorithm}:${line.auth.hash}.${line.auth.salt}`);
  }

  return fields.join(FIELD_DELIMITER);
}
