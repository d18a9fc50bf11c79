import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { Connection } from "./connection.js";

export type ConnectionManagerOptions = {
  readTimeoutMs?: number; // Idle time allowed between received chunks; 0 disables
};

/**
 * ConnectionManager owns every accepted socket until it closes.
 *
 * Each connection gets an id and an idle read deadline. The deadline restarts
 * whenever bytes arrive; on expiry the connection is destroyed, which ends any
 * pending read with no response.
 *
 * Events:
 * - connectionCreated (connection)
 * - connectionTimedOut (connectionId, idleMs)
 * - connectionClosed (connectionId)
 */
export class ConnectionManager extends EventEmitter {
  private connections: Map<string, Connection> = new Map();
  private nextId: number = 1;
  private readonly readTimeoutMs: number;

  constructor(options: ConnectionManagerOptions = {}) {
    super();
    this.readTimeoutMs = options.readTimeoutMs ?? 0;
  }

  createConnection(socket: Duplex): Connection {
    const connectionId = `conn-${this.nextId++}`;
    const connection = new Connection(socket, connectionId);

    this.connections.set(connectionId, connection);
    const disarm = this.armReadDeadline(connection);

    connection.on("close", () => {
      disarm();
      this.connections.delete(connectionId);
      this.emit("connectionClosed", connectionId);
    });

    this.emit("connectionCreated", connection);

    return connection;
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  /**
   * Close all connections; in-flight reads end immediately
   */
  closeAll(): void {
    for (const connection of this.connections.values()) {
      connection.destroy();
    }
  }

  /**
   * Start the idle timer; returns the function that cancels it
   */
  private armReadDeadline(connection: Connection): () => void {
    const idleMs = this.readTimeoutMs;
    if (idleMs <= 0) {
      return () => {};
    }

    const expire = () => {
      this.emit("connectionTimedOut", connection.connectionId, idleMs);
      connection.destroy();
    };

    let timer = setTimeout(expire, idleMs);
    const restart = () => {
      clearTimeout(timer);
      timer = setTimeout(expire, idleMs);
    };
    connection.on("received", restart);

    return () => {
      clearTimeout(timer);
      connection.off("received", restart);
    };
  }
}
