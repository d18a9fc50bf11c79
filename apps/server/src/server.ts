import { createServer, Server as NetServer, type Socket } from "net";
import { ConnectionManager } from "../../../packages/transport/src/connection/connectionManager.js";
import type { HeaderBlock } from "../../../packages/protocol/src/types.js";
import { config } from "./config.js";
import {
  LoggingNotificationSink,
  type NotificationSink,
} from "./notifications/notificationSink.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";
import { originHeaders } from "./origin.js";
import { MemoryRegistry } from "./registry/memoryRegistry.js";
import type { Registry } from "./registry/registry.js";
import { DiskResourceStore } from "./resources/diskResourceStore.js";
import { MemoryResourceStore } from "./resources/memoryResourceStore.js";
import type { ResourceStore } from "./resources/resourceStore.js";
import { GntpSession, type SessionOutcome } from "./session/gntpSession.js";

export type ServerDependencies = {
  registry: Registry;
  resourceStore: ResourceStore;
  sink: NotificationSink;
};

/**
 * GNTP TCP Listener
 *
 * Core responsibilities:
 * - Accept TCP connections
 * - Wire up Connection instances
 * - Run one session (one request, one response) per connection
 * - Log read timeouts enforced by the ConnectionManager
 */
export class GntpServer {
  private server: NetServer;
  private connectionManager: ConnectionManager;
  private registry: Registry;
  private resourceStore: ResourceStore;
  private sink: NotificationSink;
  private commonHeaders: HeaderBlock;

  constructor(deps: Partial<ServerDependencies> = {}) {
    this.connectionManager = new ConnectionManager({
      readTimeoutMs: config.readTimeoutMs,
    });
    this.connectionManager.on("connectionTimedOut", (connectionId: string, idleMs: number) => {
      logger.warn(`[${connectionId}] Read timed out after ${idleMs}ms`);
    });
    this.registry = deps.registry ?? new MemoryRegistry({ passwords: config.passwords });
    this.resourceStore =
      deps.resourceStore ??
      (config.resourceCacheDir
        ? new DiskResourceStore(config.resourceCacheDir)
        : new MemoryResourceStore());
    this.sink = deps.sink ?? new LoggingNotificationSink();
    this.commonHeaders = originHeaders(config.machineName);

    // Half-open: the response is written after the peer stops sending
    this.server = createServer({ allowHalfOpen: true }, (socket) =>
      this.handleSocket(socket)
    );
  }

  /**
   * Start the server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(config.port, config.host, () => {
        this.server.off("error", reject);
        logger.info(`GNTP listener on ${config.host}:${config.port}`);
        if (config.debug) {
          logger.info("Debug mode enabled (GNTP_DEBUG=1)");
        }
        if (config.passwords.length === 0) {
          logger.warn("No passwords configured; requests are not authenticated");
        }
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      logger.info("Shutting down GNTP listener...");

      // Print metrics before shutdown
      metrics.print();

      // Close all connections
      this.connectionManager.closeAll();

      // Close server
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          logger.info("Server stopped");
          resolve();
        }
      });
    });
  }

  /**
   * Handle new socket connection
   */
  private handleSocket(socket: Socket): void {
    const connection = this.connectionManager.createConnection(socket);
    metrics.connectionOpened();

    logger.connection(connection.connectionId, "Connected", {
      remoteAddress: socket.remoteAddress,
    });

    connection.on("error", (error) => {
      logger.error(`[${connection.connectionId}] Error: ${error.reason}`, {
        type: error.type,
        fatal: error.fatal,
      });
    });

    connection.on("close", (stats) => {
      metrics.connectionClosed();
      metrics.bytesSent(stats.bytesSent);
      metrics.bytesReceived(stats.bytesReceived);

      logger.connection(connection.connectionId, "Closed", {
        sent: `${stats.bytesSent}B`,
        received: `${stats.bytesReceived}B`,
      });
    });

    const session = new GntpSession(connection, {
      registry: this.registry,
      resourceStore: this.resourceStore,
      sink: this.sink,
      maxResourceBytes: config.maxResourceBytes,
      silentDropUnauthorized: config.silentDropUnauthorized,
      commonHeaders: this.commonHeaders,
    });

    session
      .run()
      .then((outcome) => this.record(outcome))
      .catch((err) => {
        logger.error(`[${connection.connectionId}] Session error`, {
          reason: err instanceof Error ? err.message : String(err),
        });
        connection.destroy();
      });
  }

  private record(outcome: SessionOutcome): void {
    switch (outcome.kind) {
      case "ok":
        metrics.requestProcessed(outcome.messageType);
        break;
      case "error":
        metrics.requestFailed(outcome.code);
        break;
      case "abandoned":
        metrics.requestAbandoned();
        break;
    }
  }

  /**
   * Get server stats
   */
  getStats() {
    return {
      connections: this.connectionManager.getConnectionCount(),
    };
  }
}
