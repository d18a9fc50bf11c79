/**
 * Server configuration
 */

import { hostname } from "os";
import { DEFAULT_PORT } from "../../../packages/protocol/src/constants.js";

function parseList(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const config = {
  port: parseInt(process.env.PORT || String(DEFAULT_PORT), 10),
  host: process.env.HOST || "0.0.0.0",
  debug: process.env.GNTP_DEBUG === "1",
  logLevel: process.env.LOG_LEVEL || "info",
  passwords: parseList(process.env.GNTP_PASSWORDS),
  readTimeoutMs: parseInt(process.env.GNTP_READ_TIMEOUT_MS || "30000", 10),
  maxResourceBytes: parseInt(
    process.env.GNTP_MAX_RESOURCE_BYTES || String(10 * 1024 * 1024),
    10
  ),
  resourceCacheDir: process.env.GNTP_RESOURCE_CACHE_DIR || undefined,
  silentDropUnauthorized: process.env.GNTP_SILENT_DROP === "1",
  machineName: process.env.GNTP_MACHINE_NAME || hostname(),
};
