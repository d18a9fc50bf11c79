import {
  Headers,
  MessageType,
} from "../../../../packages/protocol/src/constants.js";
import {
  UnknownApplicationError,
  UnknownNotificationError,
} from "../../../../packages/protocol/src/errors.js";
import { okResponse } from "../../../../packages/protocol/src/response.js";
import type { Response } from "../../../../packages/protocol/src/types.js";
import { logger } from "../observability/logger.js";
import {
  requireHeader,
  type PendingRequest,
} from "../session/pendingRequest.js";
import type { DispatchContext } from "./dispatch.js";

/**
 * Handle NOTIFY
 *
 * The application and type must be registered. The notification is handed
 * to the sink exactly once, disabled types included; the sink decides what a
 * disabled type means for display.
 */
export async function handleNotify(
  request: PendingRequest,
  context: DispatchContext
): Promise<Response> {
  const { headers, resources } = request;
  const applicationName = requireHeader(headers, Headers.APPLICATION_NAME);
  const typeName = requireHeader(headers, Headers.NOTIFICATION_NAME);
  const title = requireHeader(headers, Headers.NOTIFICATION_TITLE);

  const application = await context.registry.resolveApplication(applicationName);
  if (!application) {
    throw new UnknownApplicationError(applicationName);
  }

  const type = await context.registry.resolveNotificationType(application, typeName);
  if (!type) {
    throw new UnknownNotificationError(typeName);
  }

  const id = headers.get(Headers.NOTIFICATION_ID) ?? "";

  await context.sink.display({
    application,
    type,
    id,
    title,
    text: headers.get(Headers.NOTIFICATION_TEXT) ?? "",
    icon: resources.resolveIcon(headers.get(Headers.NOTIFICATION_ICON)) ?? type.icon,
    resources: resources.attached(),
    timestamp: request.startedAt,
    headers,
  });

  logger.debug(`[${context.connectionId}] Notified ${applicationName}/${typeName}`);

  return okResponse(MessageType.NOTIFY, id);
}
