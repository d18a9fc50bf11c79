import {
  EncryptionAlgorithm,
  Headers,
  MessageType,
} from "../../../../packages/protocol/src/constants.js";
import { assertCipherUsable } from "../../../../packages/protocol/src/crypto.js";
import {
  InvalidRequestError,
  NotAuthorizedError,
} from "../../../../packages/protocol/src/errors.js";
import {
  parseHeaderLine,
  parseNonNegativeInteger,
} from "../../../../packages/protocol/src/headers.js";
import { parseRequestLine } from "../../../../packages/protocol/src/requestLine.js";
import type {
  CipherSpec,
  HeaderBlock,
  RequestLine,
} from "../../../../packages/protocol/src/types.js";
import type { BlockReader } from "../../../../packages/transport/src/connection/blockReader.js";
import { logger } from "../observability/logger.js";
import type { Registry } from "../registry/registry.js";
import type { ResourceStore } from "../resources/resourceStore.js";
import { ResourceArena, type PendingRequest } from "./pendingRequest.js";
import { ResourceHandler } from "./resourceHandler.js";

/**
 * Request parsing states. Each state names what the next line means.
 */
export type RequestState =
  | { kind: "Connected" }
  | { kind: "ReadingRequestHeaders" }
  | { kind: "ReadingNotificationHeaders"; index: number }
  | { kind: "ReadingResourceHeaders"; headers: HeaderBlock }
  | { kind: "ReadingResourceData"; headers: HeaderBlock }
  | { kind: "EndOfRequest" }
  | { kind: "ResponseSent" };

export type RequestStateMachineOptions = {
  registry: Registry;
  resourceStore: ResourceStore;
  maxResourceBytes: number;
  silentDropUnauthorized: boolean;
};

// Returned by authentication when the request is to be acknowledged and dropped
const IGNORE = Symbol("ignore");

/**
 * RequestStateMachine reads exactly one request off a connection.
 *
 * Connected
 *   → ReadingRequestHeaders
 *   → ReadingNotificationHeaders × Notifications-Count (REGISTER only)
 *   → (ReadingResourceHeaders → ReadingResourceData) × referenced resources
 *   → EndOfRequest
 *
 * Any error ends the machine; the session turns it into a response.
 */
export class RequestStateMachine {
  private requestLine: RequestLine | undefined;
  private cipher: CipherSpec = {
    algorithm: EncryptionAlgorithm.NONE,
    iv: Buffer.alloc(0),
    key: Buffer.alloc(0),
  };
  private headers: HeaderBlock = new Map();
  private notificationTypes: HeaderBlock[] = [];
  private declaredCount: number = 0;
  private resources: ResourceArena = new ResourceArena();
  private disposition: PendingRequest["disposition"] = "dispatch";
  private readonly startedAt: number = Date.now();
  private readonly resourceHandler: ResourceHandler;

  constructor(
    private readonly reader: BlockReader,
    private readonly connectionId: string,
    private readonly options: RequestStateMachineOptions
  ) {
    this.resourceHandler = new ResourceHandler(
      reader,
      options.resourceStore,
      options.maxResourceBytes,
      connectionId
    );
  }

  /**
   * Message type, once the request line has been parsed
   */
  get messageType(): MessageType | undefined {
    return this.requestLine?.messageType;
  }

  /**
   * Drive the machine until the request is complete
   */
  async run(): Promise<PendingRequest> {
    let state: RequestState = { kind: "Connected" };

    while (state.kind !== "EndOfRequest" && state.kind !== "ResponseSent") {
      const next: RequestState = await this.step(state);
      if (next.kind !== state.kind) {
        logger.stateTransition(this.connectionId, state.kind, next.kind);
      }
      state = next;
    }

    return this.complete();
  }

  private step(state: RequestState): Promise<RequestState> {
    switch (state.kind) {
      case "Connected":
        return this.onConnected();
      case "ReadingRequestHeaders":
        return this.onRequestHeaders();
      case "ReadingNotificationHeaders":
        return this.onNotificationHeaders(state.index);
      case "ReadingResourceHeaders":
        return this.onResourceHeaders(state.headers);
      case "ReadingResourceData":
        return this.onResourceData(state.headers);
      case "EndOfRequest":
      case "ResponseSent":
        return Promise.resolve(state);
    }
  }

  /**
   * Request line, authentication, and decryption of the first block
   */
  private async onConnected(): Promise<RequestState> {
    const line = await this.reader.readLine();
    const requestLine = parseRequestLine(line);
    this.requestLine = requestLine;

    const key = await this.authenticate(requestLine);
    if (key === IGNORE) {
      this.disposition = "ignore";
      return { kind: "EndOfRequest" };
    }

    const { encryption } = requestLine;
    if (encryption.algorithm !== EncryptionAlgorithm.NONE) {
      if (!key) {
        throw new NotAuthorizedError("Encrypted requests must carry a password hash");
      }
      this.cipher = { algorithm: encryption.algorithm, iv: encryption.iv, key };
      assertCipherUsable(this.cipher);
      await this.reader.decryptNextBlock(this.cipher);
    }

    return { kind: "ReadingRequestHeaders" };
  }

  private async authenticate(
    requestLine: RequestLine
  ): Promise<Buffer | undefined | typeof IGNORE> {
    const { auth } = requestLine;
    const { registry } = this.options;

    if (!auth) {
      if (await registry.requiresAuthentication()) {
        throw new NotAuthorizedError("Password required");
      }
      return undefined;
    }

    const key = await registry.matchingKey(auth.algorithm, auth.hash, auth.salt);
    if (key) {
      return key;
    }

    if (
      this.options.silentDropUnauthorized &&
      requestLine.messageType === MessageType.NOTIFY
    ) {
      logger.warn(`[${this.connectionId}] Dropping NOTIFY with unmatched hash`);
      return IGNORE;
    }

    throw new NotAuthorizedError("Password hash did not match");
  }

  private async onRequestHeaders(): Promise<RequestState> {
    const line = await this.reader.readLine();

    if (line !== "") {
      this.addHeader(this.headers, line);
      return { kind: "ReadingRequestHeaders" };
    }

    if (this.messageType === MessageType.REGISTER) {
      const raw = this.headers.get(Headers.NOTIFICATIONS_COUNT);
      const count = parseNonNegativeInteger(raw);
      if (count === undefined) {
        throw new InvalidRequestError(
          `Invalid ${Headers.NOTIFICATIONS_COUNT}: ${raw ?? "(missing)"}`
        );
      }
      this.declaredCount = count;

      if (count > 0) {
        this.notificationTypes.push(new Map());
        return { kind: "ReadingNotificationHeaders", index: 0 };
      }
    }

    return this.afterHeaderBlocks();
  }

  private async onNotificationHeaders(index: number): Promise<RequestState> {
    const line = await this.reader.readLine();
    const block = this.notificationTypes[index];

    if (line !== "") {
      this.addHeader(block, line);
      return { kind: "ReadingNotificationHeaders", index };
    }

    const next = index + 1;
    if (next < this.declaredCount) {
      this.notificationTypes.push(new Map());
      return { kind: "ReadingNotificationHeaders", index: next };
    }

    return this.afterHeaderBlocks();
  }

  private async onResourceHeaders(headers: HeaderBlock): Promise<RequestState> {
    const line = await this.reader.readLine();

    if (line === "") {
      // Senders pad the previous payload with extra blank lines
      if (headers.size === 0) {
        return { kind: "ReadingResourceHeaders", headers };
      }
      return { kind: "ReadingResourceData", headers };
    }

    const { key, value } = parseHeaderLine(line);
    headers.set(key, value);
    return { kind: "ReadingResourceHeaders", headers };
  }

  private async onResourceData(headers: HeaderBlock): Promise<RequestState> {
    const resource = await this.resourceHandler.read(headers, this.cipher);
    this.resources.attach(resource);
    return this.afterHeaderBlocks();
  }

  /**
   * Read resources while references are unresolved
   */
  private afterHeaderBlocks(): RequestState {
    if (this.resources.pendingCount() > 0) {
      return { kind: "ReadingResourceHeaders", headers: new Map() };
    }
    return { kind: "EndOfRequest" };
  }

  private addHeader(block: HeaderBlock, line: string): void {
    const { key, value, resourceId } = parseHeaderLine(line);
    block.set(key, value);
    if (resourceId !== undefined) {
      this.resources.reference(resourceId);
    }
  }

  private complete(): PendingRequest {
    const requestLine = this.requestLine;
    if (!requestLine) {
      throw new InvalidRequestError("Missing request line");
    }

    return {
      requestLine,
      messageType: requestLine.messageType,
      headers: this.headers,
      declaredCount: this.declaredCount,
      notificationTypes: this.notificationTypes,
      resources: this.resources,
      startedAt: this.startedAt,
      disposition: this.disposition,
    };
  }
}
