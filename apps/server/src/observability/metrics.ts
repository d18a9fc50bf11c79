/**
 * Server metrics tracking
 */

import type { ErrorCode } from "../../../../packages/protocol/src/constants.js";

export class Metrics {
  private connectionCount: number = 0;
  private totalBytesSent: number = 0;
  private totalBytesReceived: number = 0;
  private requestsByType: Map<string, number> = new Map();
  private errorsByCode: Map<ErrorCode, number> = new Map();
  private abandonedRequests: number = 0;
  private startTime: number = Date.now();

  /**
   * Increment connection count
   */
  connectionOpened(): void {
    this.connectionCount++;
  }

  /**
   * Decrement connection count
   */
  connectionClosed(): void {
    this.connectionCount = Math.max(0, this.connectionCount - 1);
  }

  /**
   * Track bytes sent
   */
  bytesSent(bytes: number): void {
    this.totalBytesSent += bytes;
  }

  /**
   * Track bytes received
   */
  bytesReceived(bytes: number): void {
    this.totalBytesReceived += bytes;
  }

  /**
   * Count a request that was answered with OK
   */
  requestProcessed(type: string): void {
    this.requestsByType.set(type, (this.requestsByType.get(type) ?? 0) + 1);
  }

  /**
   * Count a request that was answered with ERROR
   */
  requestFailed(code: ErrorCode): void {
    this.errorsByCode.set(code, (this.errorsByCode.get(code) ?? 0) + 1);
  }

  /**
   * Count a connection that ended before its request was complete
   */
  requestAbandoned(): void {
    this.abandonedRequests++;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot() {
    const uptimeMs = Date.now() - this.startTime;
    const uptimeSec = Math.floor(uptimeMs / 1000);

    return {
      uptime: `${uptimeSec}s`,
      connections: this.connectionCount,
      totalBytesSent: this.formatBytes(this.totalBytesSent),
      totalBytesReceived: this.formatBytes(this.totalBytesReceived),
      requests: Object.fromEntries(this.requestsByType),
      errors: Object.fromEntries(this.errorsByCode),
      abandoned: this.abandonedRequests,
    };
  }

  /**
   * Format bytes to human-readable
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }

  /**
   * Print metrics to console
   */
  print(): void {
    const snapshot = this.getSnapshot();
    console.log("\n📊 Server Metrics:");
    console.log(`  Uptime:              ${snapshot.uptime}`);
    console.log(`  Active Connections:  ${snapshot.connections}`);
    console.log(`  Bytes Sent:          ${snapshot.totalBytesSent}`);
    console.log(`  Bytes Received:      ${snapshot.totalBytesReceived}`);
    console.log(`  Requests:            ${JSON.stringify(snapshot.requests)}`);
    console.log(`  Errors by Code:      ${JSON.stringify(snapshot.errors)}`);
    console.log(`  Abandoned:           ${snapshot.abandoned}`);
    console.log();
  }
}

export const metrics = new Metrics();
