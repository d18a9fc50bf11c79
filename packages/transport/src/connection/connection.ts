import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { BlockReader } from "./blockReader.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  DRAINING = "DRAINING",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export interface ConnectionEvents {
  open: (connectionId: string) => void;
  drain: () => void;
  received: (bytes: number) => void;
  error: (error: { type: "transport"; reason: string; fatal: boolean }) => void;
  close: (stats: { bytesSent: number; bytesReceived: number }) => void;
  state: (state: ConnectionState) => void;
}

/**
 * Connection represents one peer's TCP connection lifecycle.
 *
 * Responsibilities:
 * - Feed received bytes into a BlockReader
 * - Backpressure handling for outbound writes
 * - State machine enforcement (INIT → OPEN ⟷ DRAINING → CLOSING → CLOSED)
 *
 * Does NOT:
 * - Parse requests
 * - Talk to the registry
 * - Manage other connections
 */
export class Connection extends EventEmitter {
  private socket: Duplex;
  private state: ConnectionState = ConnectionState.INIT;
  public readonly connectionId: string;
  public readonly reader: BlockReader;

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;

  constructor(socket: Duplex, connectionId: string, reader = new BlockReader()) {
    super();
    this.socket = socket;
    this.connectionId = connectionId;
    this.reader = reader;
    this.wireSocket();
    this.transition(ConnectionState.OPEN);
    this.emit("open", connectionId);
  }

  /**
   * Bind socket events to Connection behavior
   */
  private wireSocket(): void {
    this.socket.on("data", (chunk: Buffer) => {
      if (this.state === ConnectionState.CLOSED) return;
      this.bytesReceived += chunk.length;
      this.reader.push(chunk);
      this.emit("received", chunk.length);
    });

    // Peer finished sending; we may still answer
    this.socket.on("end", () => {
      this.reader.end();
    });

    this.socket.on("drain", () => {
      if (this.state === ConnectionState.DRAINING) {
        this.transition(ConnectionState.OPEN);
        this.emit("drain");
      }
    });

    this.socket.on("close", () => {
      this.handleClose();
    });

    this.socket.on("error", (err: Error) => {
      this.emit("error", {
        type: "transport",
        reason: err.message,
        fatal: true,
      });
      this.destroy();
    });
  }

  /**
   * Send raw bytes to the peer
   */
  send(data: Buffer): void {
    if (
      this.state !== ConnectionState.OPEN &&
      this.state !== ConnectionState.DRAINING
    ) {
      // Silently drop if not in writable state
      return;
    }

    try {
      this.bytesSent += data.length;

      const canWrite = this.socket.write(data);

      if (!canWrite && this.state === ConnectionState.OPEN) {
        this.transition(ConnectionState.DRAINING);
      }
    } catch (err) {
      this.emit("error", {
        type: "transport",
        reason: err instanceof Error ? err.message : String(err),
        fatal: false,
      });
    }
  }

  /**
   * Close the connection gracefully (pending writes are flushed)
   */
  close(): void {
    if (
      this.state === ConnectionState.CLOSING ||
      this.state === ConnectionState.CLOSED
    ) {
      return;
    }

    this.transition(ConnectionState.CLOSING);
    this.reader.end();
    this.socket.end();
  }

  /**
   * Tear the connection down immediately (timeouts, transport errors)
   */
  destroy(): void {
    this.reader.end();
    if (this.state !== ConnectionState.CLOSED) {
      this.socket.destroy();
    }
  }

  /**
   * Handle socket close event
   */
  private handleClose(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.reader.end();
    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    });
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    // Enforce state machine rules
    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [ConnectionState.OPEN],
      [ConnectionState.OPEN]: [
        ConnectionState.DRAINING,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.DRAINING]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      bufferSize: this.reader.bufferedLength,
    };
  }
}
