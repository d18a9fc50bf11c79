/**
 * Protocol Constants
 *
 * Defines message types, algorithms, header names, and protocol parameters.
 */

// Protocol identity
export const PROTOCOL_NAME = "GNTP";
export const PROTOCOL_VERSION = "1.0";

// Framing
export const LINE_TERMINATOR = "\r\n";
export const FIELD_DELIMITER = " ";
export const BLOCK_DELIMITER = Buffer.from("\r\n\r\n", "latin1");
export const MAX_LINE_LENGTH = 64 * 1024; // 64KB safety limit
export const DEFAULT_PORT = 23053;

// Header values of the form x-growl-resource://<identifier>
export const RESOURCE_URI_PREFIX = "x-growl-resource://";

export const SUBSCRIPTION_TTL = "300";

// Message types (request line, second field)
export enum MessageType {
  REGISTER = "REGISTER",
  NOTIFY = "NOTIFY",
  SUBSCRIBE = "SUBSCRIBE",
}

export enum ResponseType {
  OK = "-OK",
  ERROR = "-ERROR",
}

// Encryption algorithms (request line, third field)
export enum EncryptionAlgorithm {
  NONE = "NONE",
  AES = "AES",
  DES = "DES",
  TRIPLE_DES = "3DES",
}

export type CipherParams = {
  cipherName: string; // Node/OpenSSL cipher name
  keyLength: number; // bytes
  ivLength: number; // bytes
};

export const CIPHER_PARAMS: Record<
  Exclude<EncryptionAlgorithm, EncryptionAlgorithm.NONE>,
  CipherParams
> = {
  [EncryptionAlgorithm.AES]: { cipherName: "aes-192-cbc", keyLength: 24, ivLength: 16 },
  [EncryptionAlgorithm.DES]: { cipherName: "des-cbc", keyLength: 8, ivLength: 8 },
  [EncryptionAlgorithm.TRIPLE_DES]: { cipherName: "des-ede3-cbc", keyLength: 24, ivLength: 8 },
};

// Key hash algorithms (request line, optional fourth field)
export enum HashAlgorithm {
  MD5 = "MD5",
  SHA1 = "SHA1",
  SHA256 = "SHA256",
  SHA512 = "SHA512",
}

export const DIGEST_NAMES: Record<HashAlgorithm, string> = {
  [HashAlgorithm.MD5]: "md5",
  [HashAlgorithm.SHA1]: "sha1",
  [HashAlgorithm.SHA256]: "sha256",
  [HashAlgorithm.SHA512]: "sha512",
};

// Error codes carried in Error-Code
export enum ErrorCode {
  INVALID_REQUEST = 300,
  UNKNOWN_PROTOCOL = 301,
  UNKNOWN_PROTOCOL_VERSION = 302,
  NOT_AUTHORIZED = 400,
  UNKNOWN_APPLICATION = 401,
  UNKNOWN_NOTIFICATION = 402,
  INTERNAL_SERVER_ERROR = 500,
}

export const ERROR_DESCRIPTIONS: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_REQUEST]: "Invalid request",
  [ErrorCode.UNKNOWN_PROTOCOL]: "Unknown protocol",
  [ErrorCode.UNKNOWN_PROTOCOL_VERSION]: "Unknown protocol version",
  [ErrorCode.NOT_AUTHORIZED]: "Not authorized",
  [ErrorCode.UNKNOWN_APPLICATION]: "Unknown application",
  [ErrorCode.UNKNOWN_NOTIFICATION]: "Unknown notification",
  [ErrorCode.INTERNAL_SERVER_ERROR]: "Internal server error",
};

// Header names
export const Headers = {
  APPLICATION_NAME: "Application-Name",
  APPLICATION_ICON: "Application-Icon",
  NOTIFICATIONS_COUNT: "Notifications-Count",
  NOTIFICATION_NAME: "Notification-Name",
  NOTIFICATION_DISPLAY_NAME: "Notification-Display-Name",
  NOTIFICATION_ENABLED: "Notification-Enabled",
  NOTIFICATION_ICON: "Notification-Icon",
  NOTIFICATION_ID: "Notification-ID",
  NOTIFICATION_TITLE: "Notification-Title",
  NOTIFICATION_TEXT: "Notification-Text",
  RESOURCE_IDENTIFIER: "Identifier",
  RESOURCE_LENGTH: "Length",
  RESPONSE_ACTION: "Response-Action",
  ERROR_CODE: "Error-Code",
  ERROR_DESCRIPTION: "Error-Description",
  SUBSCRIPTION_TTL: "Subscription-TTL",
  ORIGIN_MACHINE_NAME: "Origin-Machine-Name",
  ORIGIN_SOFTWARE_NAME: "Origin-Software-Name",
  ORIGIN_SOFTWARE_VERSION: "Origin-Software-Version",
  ORIGIN_PLATFORM_NAME: "Origin-Platform-Name",
  ORIGIN_PLATFORM_VERSION: "Origin-Platform-Version",
} as const;
