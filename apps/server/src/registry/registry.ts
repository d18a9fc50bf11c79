import type { HashAlgorithm } from "../../../../packages/protocol/src/constants.js";
import type { IconReference } from "../../../../packages/protocol/src/types.js";

export type RegisteredApplication = {
  readonly name: string;
  icon?: IconReference;
};

export type RegisteredNotificationType = {
  readonly application: string;
  readonly name: string;
  displayName: string;
  enabled: boolean;
  icon?: IconReference;
};

/**
 * Registry owns applications, their notification types, and the password
 * list. Implementations serialize their own mutations: a register call must
 * be visible to any resolve call that starts after it completes.
 */
export interface Registry {
  resolveApplication(name: string): Promise<RegisteredApplication | undefined>;

  /**
   * Create the application, or update the icon of an existing one
   */
  registerApplication(
    name: string,
    icon?: IconReference
  ): Promise<RegisteredApplication>;

  resolveNotificationType(
    application: RegisteredApplication,
    name: string
  ): Promise<RegisteredNotificationType | undefined>;

  /**
   * Create the type, or update an existing one with the same name
   */
  registerNotificationType(
    application: RegisteredApplication,
    name: string,
    displayName: string,
    enabled: boolean,
    icon?: IconReference
  ): Promise<RegisteredNotificationType>;

  /**
   * @returns The key derived from the password that produced `hash`, or
   * undefined when no configured password matches
   */
  matchingKey(
    algorithm: HashAlgorithm,
    hash: string,
    salt: string
  ): Promise<Buffer | undefined>;

  requiresAuthentication(): Promise<boolean>;
}
