import {
  Headers,
  MessageType,
} from "../../../../packages/protocol/src/constants.js";
import { InvalidRequestError } from "../../../../packages/protocol/src/errors.js";
import { okResponse } from "../../../../packages/protocol/src/response.js";
import type { Response } from "../../../../packages/protocol/src/types.js";
import { logger } from "../observability/logger.js";
import {
  requireHeader,
  toNotificationTypeSpec,
  type PendingRequest,
} from "../session/pendingRequest.js";
import type { DispatchContext } from "./dispatch.js";

/**
 * Handle REGISTER
 *
 * Creates or updates the application and each declared notification type.
 * Every block is validated before the registry is touched.
 */
export async function handleRegister(
  request: PendingRequest,
  context: DispatchContext
): Promise<Response> {
  const { headers, resources } = request;
  const name = requireHeader(headers, Headers.APPLICATION_NAME);
  const icon = resources.resolveIcon(headers.get(Headers.APPLICATION_ICON));

  if (request.notificationTypes.length !== request.declaredCount) {
    throw new InvalidRequestError(
      `Expected ${request.declaredCount} notification types, got ${request.notificationTypes.length}`
    );
  }

  const specs = request.notificationTypes.map((block) =>
    toNotificationTypeSpec(block, resources)
  );

  const application = await context.registry.registerApplication(name, icon);
  for (const spec of specs) {
    await context.registry.registerNotificationType(
      application,
      spec.name,
      spec.displayName,
      spec.enabled,
      spec.icon
    );
  }

  logger.info(
    `[${context.connectionId}] Registered '${name}' with ${specs.length} notification type(s)`
  );

  return okResponse(MessageType.REGISTER);
}
