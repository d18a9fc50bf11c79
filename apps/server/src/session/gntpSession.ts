import type { ErrorCode, MessageType } from "../../../../packages/protocol/src/constants.js";
import {
  ProtocolError,
  toProtocolError,
} from "../../../../packages/protocol/src/errors.js";
import {
  encodeResponse,
  errorResponse,
  withCommonHeaders,
} from "../../../../packages/protocol/src/response.js";
import type { HeaderBlock, Response } from "../../../../packages/protocol/src/types.js";
import { EndOfStreamError } from "../../../../packages/transport/src/connection/blockReader.js";
import type { Connection } from "../../../../packages/transport/src/connection/connection.js";
import { dispatch } from "../handlers/dispatch.js";
import type { NotificationSink } from "../notifications/notificationSink.js";
import { logger } from "../observability/logger.js";
import type { Registry } from "../registry/registry.js";
import type { ResourceStore } from "../resources/resourceStore.js";
import { RequestStateMachine } from "./requestStateMachine.js";

export type SessionDependencies = {
  registry: Registry;
  resourceStore: ResourceStore;
  sink: NotificationSink;
  maxResourceBytes: number;
  silentDropUnauthorized: boolean;
  commonHeaders: HeaderBlock; // Origin-* headers added to every response
};

export type SessionOutcome =
  | { kind: "ok"; messageType: MessageType; ignored: boolean }
  | { kind: "error"; code: ErrorCode }
  | { kind: "abandoned" };

/**
 * GntpSession serves one request on one connection.
 *
 * Exactly one response is written unless the peer goes away first;
 * the connection is closed afterwards either way.
 */
export class GntpSession {
  constructor(
    private readonly connection: Connection,
    private readonly deps: SessionDependencies
  ) {}

  async run(): Promise<SessionOutcome> {
    const connectionId = this.connection.connectionId;
    const machine = new RequestStateMachine(this.connection.reader, connectionId, {
      registry: this.deps.registry,
      resourceStore: this.deps.resourceStore,
      maxResourceBytes: this.deps.maxResourceBytes,
      silentDropUnauthorized: this.deps.silentDropUnauthorized,
    });

    let response: Response;
    let outcome: SessionOutcome;

    try {
      const request = await machine.run();
      response = await dispatch(request, {
        registry: this.deps.registry,
        sink: this.deps.sink,
        connectionId,
      });
      outcome = {
        kind: "ok",
        messageType: request.messageType,
        ignored: request.disposition === "ignore",
      };
    } catch (err) {
      if (err instanceof EndOfStreamError) {
        logger.connection(connectionId, "Peer closed before request was complete");
        this.connection.close();
        return { kind: "abandoned" };
      }

      const error = toProtocolError(err);
      if (err instanceof ProtocolError) {
        logger.warn(`[${connectionId}] Request failed: ${error.message}`, {
          code: error.code,
        });
      } else {
        logger.error(`[${connectionId}] Unexpected error`, {
          reason: err instanceof Error ? err.message : String(err),
        });
      }

      response = errorResponse(error, machine.messageType);
      outcome = { kind: "error", code: error.code };
    }

    this.connection.send(
      encodeResponse(withCommonHeaders(response, this.deps.commonHeaders))
    );
    logger.stateTransition(connectionId, "EndOfRequest", "ResponseSent");
    this.connection.close();

    return outcome;
  }
}
