import { MessageType } from "../../../../packages/protocol/src/constants.js";
import { okResponse } from "../../../../packages/protocol/src/response.js";
import type { Response } from "../../../../packages/protocol/src/types.js";
import type { NotificationSink } from "../notifications/notificationSink.js";
import { logger } from "../observability/logger.js";
import type { Registry } from "../registry/registry.js";
import type { PendingRequest } from "../session/pendingRequest.js";
import { handleNotify } from "./notify.js";
import { handleRegister } from "./register.js";
import { handleSubscribe } from "./subscribe.js";

export type DispatchContext = {
  registry: Registry;
  sink: NotificationSink;
  connectionId: string;
};

/**
 * Route a completed request to its handler
 */
export async function dispatch(
  request: PendingRequest,
  context: DispatchContext
): Promise<Response> {
  if (request.disposition === "ignore") {
    logger.debug(`[${context.connectionId}] Acknowledged dropped ${request.messageType}`);
    return okResponse(request.messageType);
  }

  request.resources.assertResolved();

  switch (request.messageType) {
    case MessageType.REGISTER:
      return handleRegister(request, context);

    case MessageType.NOTIFY:
      return handleNotify(request, context);

    case MessageType.SUBSCRIBE:
      return handleSubscribe();
  }
}
