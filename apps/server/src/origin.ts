import { release } from "os";
import { Headers } from "../../../packages/protocol/src/constants.js";
import type { HeaderBlock } from "../../../packages/protocol/src/types.js";

export const SOFTWARE_NAME = "gntp-listener";
export const SOFTWARE_VERSION = "1.0.0";

/**
 * Origin-* headers describing this listener
 */
export function originHeaders(machineName: string): HeaderBlock {
  return new Map<string, string>([
    [Headers.ORIGIN_MACHINE_NAME, machineName],
    [Headers.ORIGIN_SOFTWARE_NAME, SOFTWARE_NAME],
    [Headers.ORIGIN_SOFTWARE_VERSION, SOFTWARE_VERSION],
    [Headers.ORIGIN_PLATFORM_NAME, process.platform],
    [Headers.ORIGIN_PLATFORM_VERSION, release()],
  ]);
}
