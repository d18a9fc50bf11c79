import {
  Headers,
  type MessageType,
} from "../../../../packages/protocol/src/constants.js";
import { InvalidRequestError } from "../../../../packages/protocol/src/errors.js";
import {
  parseBoolean,
  resourceIdentifierOf,
} from "../../../../packages/protocol/src/headers.js";
import type {
  HeaderBlock,
  IconReference,
  RequestLine,
  Resource,
} from "../../../../packages/protocol/src/types.js";

/**
 * ResourceArena holds a request's resources by identifier.
 *
 * Header values reference identifiers before the payloads arrive; a
 * reference is a placeholder until the matching resource is attached.
 */
export class ResourceArena {
  private entries: Map<string, Resource | undefined> = new Map();

  /**
   * Record a reference seen in a header value
   */
  reference(identifier: string): void {
    if (!this.entries.has(identifier)) {
      this.entries.set(identifier, undefined);
    }
  }

  /**
   * Attach a payload; identifiers are unique within a request
   */
  attach(resource: Resource): void {
    if (this.entries.get(resource.identifier)) {
      throw new InvalidRequestError(`Duplicate resource: ${resource.identifier}`);
    }
    this.entries.set(resource.identifier, resource);
  }

  resolve(identifier: string): Resource | undefined {
    return this.entries.get(identifier);
  }

  /**
   * Number of references still waiting for a payload
   */
  pendingCount(): number {
    let pending = 0;
    for (const resource of this.entries.values()) {
      if (!resource) pending++;
    }
    return pending;
  }

  attached(): Resource[] {
    const resources: Resource[] = [];
    for (const resource of this.entries.values()) {
      if (resource) resources.push(resource);
    }
    return resources;
  }

  assertResolved(): void {
    for (const [identifier, resource] of this.entries) {
      if (!resource) {
        throw new InvalidRequestError(`Resource was never sent: ${identifier}`);
      }
    }
  }

  /**
   * Icon from a header value: a URL, or a reference to an attached resource
   */
  resolveIcon(value: string | undefined): IconReference | undefined {
    if (value === undefined || value === "") {
      return undefined;
    }

    const identifier = resourceIdentifierOf(value);
    if (identifier === undefined) {
      return { kind: "url", url: value };
    }

    const resource = this.resolve(identifier);
    if (!resource) {
      throw new InvalidRequestError(`Resource was never sent: ${identifier}`);
    }
    return { kind: "resource", resource };
  }
}

/**
 * A completed request, ready for dispatch
 */
export type PendingRequest = {
  requestLine: RequestLine;
  messageType: MessageType;
  headers: HeaderBlock;
  declaredCount: number; // Notifications-Count (REGISTER), 0 otherwise
  notificationTypes: HeaderBlock[];
  resources: ResourceArena;
  startedAt: number;
  // "ignore": hash matched no password and silent drop is enabled
  disposition: "dispatch" | "ignore";
};

export type NotificationTypeSpec = {
  name: string;
  displayName: string;
  enabled: boolean;
  icon?: IconReference;
};

export function requireHeader(headers: HeaderBlock, name: string): string {
  const value = headers.get(name);
  if (value === undefined || value === "") {
    throw new InvalidRequestError(`Missing header: ${name}`);
  }
  return value;
}

/**
 * Read one REGISTER notification-type block
 */
export function toNotificationTypeSpec(
  block: HeaderBlock,
  resources: ResourceArena
): NotificationTypeSpec {
  const name = requireHeader(block, Headers.NOTIFICATION_NAME);
  const displayName = block.get(Headers.NOTIFICATION_DISPLAY_NAME) || name;

  return {
    name,
    displayName,
    enabled: parseBoolean(block.get(Headers.NOTIFICATION_ENABLED)),
    icon: resources.resolveIcon(block.get(Headers.NOTIFICATION_ICON)),
  };
}
