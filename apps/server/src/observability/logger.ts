/**
 * Centralized logging with debug mode support
 */

import { config } from "../config.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

class Logger {
  private debugEnabled: boolean;
  private silent: boolean;

  constructor() {
    this.debugEnabled = config.debug;
    this.silent = config.logLevel === "silent";
  }

  /**
   * Format timestamp
   */
  private timestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Format log message
   */
  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when GNTP_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled && !this.silent) {
      console.log(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  /**
   * Info logs
   */
  info(message: string, meta?: unknown): void {
    if (this.silent) return;
    console.log(this.format(LogLevel.INFO, message, meta));
  }

  /**
   * Warning logs
   */
  warn(message: string, meta?: unknown): void {
    if (this.silent) return;
    console.warn(this.format(LogLevel.WARN, message, meta));
  }

  /**
   * Error logs
   */
  error(message: string, meta?: unknown): void {
    if (this.silent) return;
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log connection event
   */
  connection(connectionId: string, event: string, meta?: unknown): void {
    const message = `[${connectionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Log request state transition (debug only)
   */
  stateTransition(
    connectionId: string,
    from: string,
    to: string,
    reason?: string
  ): void {
    if (!this.debugEnabled) return;

    this.debug(
      `[${connectionId}] State: ${from} → ${to}`,
      reason ? { reason } : undefined
    );
  }

  /**
   * Log resource payload handling (debug only)
   */
  resource(
    connectionId: string,
    identifier: string,
    size: number,
    cached: boolean
  ): void {
    if (!this.debugEnabled) return;

    this.debug(
      `[${connectionId}] Resource ${identifier} ${cached ? "skipped (cached)" : "stored"}`,
      { size: `${size}B` }
    );
  }
}

export const logger = new Logger();
