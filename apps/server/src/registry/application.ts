import type { IconReference } from "../../../../packages/protocol/src/types.js";
import type {
  RegisteredApplication,
  RegisteredNotificationType,
} from "./registry.js";

/**
 * Application is a registered sender and the notification types it may emit.
 *
 * Pure domain logic - no socket or protocol concerns.
 */
export class Application implements RegisteredApplication {
  public readonly name: string;
  public icon?: IconReference;
  private types: Map<string, RegisteredNotificationType> = new Map();

  constructor(name: string, icon?: IconReference) {
    this.name = name;
    this.icon = icon;
  }

  /**
   * Add a notification type, or update the one with the same name
   */
  registerNotificationType(
    name: string,
    displayName: string,
    enabled: boolean,
    icon?: IconReference
  ): RegisteredNotificationType {
    const existing = this.types.get(name);
    if (existing) {
      existing.displayName = displayName;
      existing.enabled = enabled;
      existing.icon = icon;
      return existing;
    }

    const type: RegisteredNotificationType = {
      application: this.name,
      name,
      displayName,
      enabled,
      icon,
    };
    this.types.set(name, type);
    return type;
  }

  getNotificationType(name: string): RegisteredNotificationType | undefined {
    return this.types.get(name);
  }
}
