/**
 * Response Encoding and Decoding
 *
 * GNTP/1.0 -OK NONE
 * Response-Action: NOTIFY
 * Notification-ID: ...
 * <blank line>
 */

import {
  EncryptionAlgorithm,
  FIELD_DELIMITER,
  Headers,
  LINE_TERMINATOR,
  MessageType,
  PROTOCOL_NAME,
  PROTOCOL_VERSION,
  ResponseType,
  SUBSCRIPTION_TTL,
} from "./constants.js";
import { InvalidRequestError, type ProtocolError } from "./errors.js";
import { formatHeaders, parseHeaderLine } from "./headers.js";
import type { HeaderBlock, Response } from "./types.js";

/**
 * Successful response for a message type
 *
 * @param notificationId - Echoed on NOTIFY, empty when the request had none
 */
export function okResponse(action: MessageType, notificationId = ""): Response {
  const headers: HeaderBlock = new Map<string, string>([
    [Headers.RESPONSE_ACTION, action],
  ]);

  switch (action) {
    case MessageType.NOTIFY:
      headers.set(Headers.NOTIFICATION_ID, notificationId);
      break;

    case MessageType.SUBSCRIBE:
      headers.set(Headers.SUBSCRIPTION_TTL, SUBSCRIPTION_TTL);
      break;
  }

  return { type: ResponseType.OK, headers };
}

/**
 * Error response carrying code and description
 *
 * @param action - Message type, when the request line got that far
 */
export function errorResponse(error: ProtocolError, action?: MessageType): Response {
  const headers: HeaderBlock = new Map();
  if (action) {
    headers.set(Headers.RESPONSE_ACTION, action);
  }
  headers.set(Headers.ERROR_CODE, String(error.code));
  headers.set(Headers.ERROR_DESCRIPTION, error.message.replace(/[\r\n]+/g, " "));

  return { type: ResponseType.ERROR, headers };
}

/**
 * Append headers that every response carries (Origin-*)
 */
export function withCommonHeaders(response: Response, common: HeaderBlock): Response {
  const headers = new Map(response.headers);
  for (const [key, value] of common) {
    if (!headers.has(key)) {
      headers.set(key, value);
    }
  }
  return { type: response.type, headers };
}

/**
 * Encode a response for transmission
 */
export function encodeResponse(response: Response): Buffer {
  const statusLine = [
    `${PROTOCOL_NAME}/${PROTOCOL_VERSION}`,
    response.type,
    EncryptionAlgorithm.NONE,
  ].join(FIELD_DELIMITER);

  const text =
    statusLine + LINE_TERMINATOR + formatHeaders(response.headers) + LINE_TERMINATOR;

  return Buffer.from(text, "utf8");
}

/**
 * Decode a complete response (sender side)
 */
export function parseResponse(data: Buffer | string): Response {
  const text = typeof data === "string" ? data : data.toString("utf8");
  const lines = text.split("\n").map((line) => line.replace(/\r$/, ""));

  const status = lines[0].trim().split(FIELD_DELIMITER);
  if (status.length !== 3 || status[0] !== `${PROTOCOL_NAME}/${PROTOCOL_VERSION}`) {
    throw new InvalidRequestError(`Malformed response line: ${lines[0]}`);
  }

  const type = Object.values(ResponseType).find((value) => value === status[1]);
  if (!type) {
    throw new InvalidRequestError(`Unknown response type: ${status[1]}`);
  }

  const headers: HeaderBlock = new Map();
  for (const line of lines.slice(1)) {
    if (line === "") break;
    const { key, value } = parseHeaderLine(line);
    headers.set(key, value);
  }

  return { type, headers };
}
