/**
 * Header Parsing
 *
 * "Key: Value" lines, split on the first colon only.
 */

import { LINE_TERMINATOR, RESOURCE_URI_PREFIX } from "./constants.js";
import { InvalidRequestError } from "./errors.js";
import type { HeaderBlock } from "./types.js";

export type ParsedHeader = {
  key: string;
  value: string;
  resourceId?: string; // Set when value is x-growl-resource://<id>
};

/**
 * Identifier referenced by a header value, if any
 */
export function resourceIdentifierOf(value: string): string | undefined {
  if (!value.startsWith(RESOURCE_URI_PREFIX)) {
    return undefined;
  }
  return value.slice(RESOURCE_URI_PREFIX.length);
}

export function resourceUri(identifier: string): string {
  return `${RESOURCE_URI_PREFIX}${identifier}`;
}

/**
 * Parse one header line
 */
export function parseHeaderLine(line: string): ParsedHeader {
  const colon = line.indexOf(":");
  if (colon === -1) {
    throw new InvalidRequestError(`Unable to parse header: ${line}`);
  }

  const key = line.slice(0, colon).trim();
  if (key.length === 0) {
    throw new InvalidRequestError(`Unable to parse header: ${line}`);
  }

  const value = line.slice(colon + 1).trim();
  const resourceId = resourceIdentifierOf(value);

  return resourceId === undefined ? { key, value } : { key, value, resourceId };
}

/**
 * Serialize a header block (no trailing blank line)
 */
export function formatHeaders(headers: HeaderBlock): string {
  let text = "";
  for (const [key, value] of headers) {
    text += `${key}: ${value}${LINE_TERMINATOR}`;
  }
  return text;
}

/**
 * GNTP booleans: "True"/"Yes" (any case) or "1"
 */
export function parseBoolean(value: string | undefined): boolean {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === "true" || normalized === "yes" || normalized === "1";
}

/**
 * @returns The integer, or undefined when the value is absent or not a
 * plain non-negative decimal
 */
export function parseNonNegativeInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
