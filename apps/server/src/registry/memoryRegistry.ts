import type { HashAlgorithm } from "../../../../packages/protocol/src/constants.js";
import { findMatchingKey } from "../../../../packages/protocol/src/auth.js";
import type { IconReference } from "../../../../packages/protocol/src/types.js";
import { Application } from "./application.js";
import type {
  RegisteredApplication,
  RegisteredNotificationType,
  Registry,
} from "./registry.js";

/**
 * MemoryRegistry keeps applications in process memory.
 *
 * Every method body runs to completion without awaiting, so on the event
 * loop each call is atomic with respect to other sessions.
 */
export class MemoryRegistry implements Registry {
  private applications: Map<string, Application> = new Map();
  private readonly passwords: readonly string[];

  constructor(options: { passwords?: readonly string[] } = {}) {
    this.passwords = options.passwords ?? [];
  }

  async resolveApplication(name: string): Promise<Application | undefined> {
    return this.applications.get(name);
  }

  async registerApplication(
    name: string,
    icon?: IconReference
  ): Promise<Application> {
    const existing = this.applications.get(name);
    if (existing) {
      existing.icon = icon;
      return existing;
    }

    const application = new Application(name, icon);
    this.applications.set(name, application);
    return application;
  }

  async resolveNotificationType(
    application: RegisteredApplication,
    name: string
  ): Promise<RegisteredNotificationType | undefined> {
    return this.applications.get(application.name)?.getNotificationType(name);
  }

  async registerNotificationType(
    application: RegisteredApplication,
    name: string,
    displayName: string,
    enabled: boolean,
    icon?: IconReference
  ): Promise<RegisteredNotificationType> {
    let owner = this.applications.get(application.name);
    if (!owner) {
      owner = new Application(application.name, application.icon);
      this.applications.set(owner.name, owner);
    }
    return owner.registerNotificationType(name, displayName, enabled, icon);
  }

  async matchingKey(
    algorithm: HashAlgorithm,
    hash: string,
    salt: string
  ): Promise<Buffer | undefined> {
    return findMatchingKey(this.passwords, { algorithm, hash, salt });
  }

  async requiresAuthentication(): Promise<boolean> {
    return this.passwords.length > 0;
  }

  /**
   * Get application count
   */
  getApplicationCount(): number {
    return this.applications.size;
  }

  /**
   * Get all application names
   */
  getApplicationNames(): string[] {
    return Array.from(this.applications.keys());
  }
}
