import type {
  HeaderBlock,
  IconReference,
  Resource,
} from "../../../../packages/protocol/src/types.js";
import { logger } from "../observability/logger.js";
import type {
  RegisteredApplication,
  RegisteredNotificationType,
} from "../registry/registry.js";

/**
 * A validated NOTIFY, as handed to whatever displays it
 */
export type Notification = {
  application: RegisteredApplication;
  type: RegisteredNotificationType;
  id: string; // Empty when the sender gave none
  title: string;
  text: string;
  icon?: IconReference;
  resources: Resource[];
  timestamp: number; // Epoch ms at which the request started
  headers: HeaderBlock;
};

export interface NotificationSink {
  display(notification: Notification): Promise<void>;
}

/**
 * Writes each notification to the log
 */
export class LoggingNotificationSink implements NotificationSink {
  async display(notification: Notification): Promise<void> {
    const { application, type, title, text } = notification;
    if (!type.enabled) {
      logger.debug(`[${application.name}] Suppressed '${type.name}' (disabled): ${title}`);
      return;
    }

    logger.info(`🔔 [${application.name}] ${title}${text ? `: ${text}` : ""}`, {
      type: type.displayName,
      id: notification.id || undefined,
      resources: notification.resources.length,
    });
  }
}
