import { afterEach, describe, expect, it, vi } from "vitest";
import { FakeSocket } from "../testing/fakeSocket.js";
import { EndOfStreamError } from "./blockReader.js";
import { Connection, ConnectionState } from "./connection.js";
import { ConnectionManager } from "./connectionManager.js";

describe("Connection", () => {
  it("opens on construction", () => {
    const connection = new Connection(new FakeSocket(), "conn-1");
    expect(connection.getState()).toBe(ConnectionState.OPEN);
  });

  it("feeds received bytes to its reader", async () => {
    const socket = new FakeSocket();
    const connection = new Connection(socket, "conn-1");

    socket.feed("GNTP/1.0 NOTIFY NONE\r\n");

    expect(await connection.reader.readLine()).toBe("GNTP/1.0 NOTIFY NONE");
    expect(connection.getStats().bytesReceived).toBe(22);
  });

  it("writes to the socket and counts bytes", () => {
    const socket = new FakeSocket();
    const connection = new Connection(socket, "conn-1");

    connection.send(Buffer.from("hello"));

    expect(socket.written().toString()).toBe("hello");
    expect(connection.getStats().bytesSent).toBe(5);
  });

  it("drops writes once closing", () => {
    const socket = new FakeSocket();
    const connection = new Connection(socket, "conn-1");

    connection.close();
    connection.send(Buffer.from("late"));

    expect(connection.getState()).toBe(ConnectionState.CLOSING);
    expect(socket.written().length).toBe(0);
  });

  it("emits close with statistics once the socket closes", async () => {
    const socket = new FakeSocket();
    const connection = new Connection(socket, "conn-1");
    const closed = new Promise<{ bytesSent: number; bytesReceived: number }>((resolve) =>
      connection.once("close", resolve)
    );

    connection.send(Buffer.from("bye"));
    socket.destroy();

    expect(await closed).toEqual({ bytesSent: 3, bytesReceived: 0 });
    expect(connection.getState()).toBe(ConnectionState.CLOSED);
  });
});

describe("ConnectionManager", () => {
  it("assigns sequential ids and forgets closed connections", async () => {
    const manager = new ConnectionManager();
    const first = manager.createConnection(new FakeSocket());
    const second = manager.createConnection(new FakeSocket());

    expect(first.connectionId).toBe("conn-1");
    expect(second.connectionId).toBe("conn-2");
    expect(manager.getConnectionCount()).toBe(2);

    const closed = new Promise((resolve) => manager.once("connectionClosed", resolve));
    first.destroy();

    expect(await closed).toBe("conn-1");
    expect(manager.getConnectionCount()).toBe(1);
  });
});

describe("ConnectionManager read deadline", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("restarts on received bytes and destroys an idle connection", async () => {
    vi.useFakeTimers();
    const manager = new ConnectionManager({ readTimeoutMs: 1000 });
    const timedOut: [string, number][] = [];
    manager.on("connectionTimedOut", (connectionId: string, idleMs: number) => {
      timedOut.push([connectionId, idleMs]);
    });
    const socket = new FakeSocket();
    const connection = manager.createConnection(socket);

    vi.advanceTimersByTime(900);
    socket.feed("GNTP/1.0 NOTIFY NONE\r\n");
    expect(await connection.reader.readLine()).toBe("GNTP/1.0 NOTIFY NONE");

    vi.advanceTimersByTime(900);
    expect(timedOut).toEqual([]);
    expect(connection.getState()).toBe(ConnectionState.OPEN);

    vi.advanceTimersByTime(100);
    expect(timedOut).toEqual([["conn-1", 1000]]);
    await expect(connection.reader.readLine()).rejects.toBeInstanceOf(EndOfStreamError);
  });

  it("does not arm a deadline when the read timeout is zero", () => {
    vi.useFakeTimers();
    const manager = new ConnectionManager({ readTimeoutMs: 0 });
    const connection = manager.createConnection(new FakeSocket());

    vi.advanceTimersByTime(60_000);

    expect(connection.getState()).toBe(ConnectionState.OPEN);
  });
});
