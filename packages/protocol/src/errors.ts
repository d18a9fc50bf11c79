/**
 * Protocol Error Classes
 *
 * Every failure a peer can be told about is a ProtocolError carrying its
 * Error-Code. Anything else maps to INTERNAL_SERVER_ERROR.
 */

import { ErrorCode, ERROR_DESCRIPTIONS } from "./constants.js";

export class ProtocolError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string) {
    super(message ?? ERROR_DESCRIPTIONS[code]);
    this.name = "ProtocolError";
    this.code = code;
  }
}

export class InvalidRequestError extends ProtocolError {
  constructor(message?: string) {
    super(ErrorCode.INVALID_REQUEST, message);
    this.name = "InvalidRequestError";
  }
}

/**
 * Bad padding, tampered bytes, or a key that does not fit the cipher
 */
export class DecryptionError extends InvalidRequestError {
  constructor(message: string) {
    super(`Unable to decrypt ${message}`);
    this.name = "DecryptionError";
  }
}

export class UnknownProtocolError extends ProtocolError {
  constructor(protocol: string) {
    super(ErrorCode.UNKNOWN_PROTOCOL, `Unknown protocol: ${protocol}`);
    this.name = "UnknownProtocolError";
  }
}

export class UnsupportedVersionError extends ProtocolError {
  constructor(version: string) {
    super(
      ErrorCode.UNKNOWN_PROTOCOL_VERSION,
      `Unsupported protocol version: ${version}`
    );
    this.name = "UnsupportedVersionError";
  }
}

export class NotAuthorizedError extends ProtocolError {
  constructor(message?: string) {
    super(ErrorCode.NOT_AUTHORIZED, message);
    this.name = "NotAuthorizedError";
  }
}

export class UnknownApplicationError extends ProtocolError {
  constructor(name: string) {
    super(ErrorCode.UNKNOWN_APPLICATION, `Unknown application: ${name}`);
    this.name = "UnknownApplicationError";
  }
}

export class UnknownNotificationError extends ProtocolError {
  constructor(name: string) {
    super(ErrorCode.UNKNOWN_NOTIFICATION, `Unknown notification: ${name}`);
    this.name = "UnknownNotificationError";
  }
}

export class InternalServerError extends ProtocolError {
  constructor(message?: string) {
    super(ErrorCode.INTERNAL_SERVER_ERROR, message);
    this.name = "InternalServerError";
  }
}

/**
 * Map any thrown value to exactly one protocol error
 */
export function toProtocolError(err: unknown): ProtocolError {
  if (err instanceof ProtocolError) {
    return err;
  }
  return new InternalServerError();
}
