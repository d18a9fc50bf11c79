/**
 * Protocol Type Definitions
 */

import type {
  EncryptionAlgorithm,
  HashAlgorithm,
  MessageType,
  ResponseType,
} from "./constants.js";

/**
 * Ordered "Key: Value" pairs of one header block
 */
export type HeaderBlock = Map<string, string>;

/**
 * Encryption spec from the request line (third field)
 */
export type EncryptionSpec = {
  algorithm: EncryptionAlgorithm;
  iv: Buffer; // Empty for NONE
};

/**
 * Auth spec from the request line (optional fourth field)
 */
export type AuthSpec = {
  algorithm: HashAlgorithm;
  hash: string; // Hex, as sent
  salt: string; // Hex, as sent
};

/**
 * First line of a request
 */
export type RequestLine = {
  readonly version: string;
  readonly messageType: MessageType;
  readonly encryption: EncryptionSpec;
  readonly auth?: AuthSpec;
};

/**
 * Key material for one connection
 */
export type CipherSpec = {
  algorithm: EncryptionAlgorithm;
  iv: Buffer;
  key: Buffer;
};

/**
 * Embedded binary resource
 */
export type Resource = {
  identifier: string;
  length: number; // Declared length (bytes on the wire)
  data: Buffer; // Decrypted payload
  cached: boolean; // True when the store already held this payload
};

/**
 * Icon given as a URL or as an attached resource
 */
export type IconReference =
  | { kind: "url"; url: string }
  | { kind: "resource"; resource: Resource };

/**
 * A response as sent on the wire
 */
export type Response = {
  type: ResponseType;
  headers: HeaderBlock;
};

/**
 * Request as built by a sender
 */
export type OutgoingRequest = {
  messageType: MessageType;
  headers: HeaderBlock;
  notificationTypes?: HeaderBlock[];
  resources?: { identifier: string; data: Buffer }[];
  password?: string;
  hashAlgorithm?: HashAlgorithm;
  encryption?: EncryptionAlgorithm;
};
