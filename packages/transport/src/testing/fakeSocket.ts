import { Duplex } from "stream";

/**
 * In-process stand-in for a TCP socket.
 *
 * Bytes fed in are read by whoever owns the socket; bytes written by the
 * owner are collected for assertions.
 */
export class FakeSocket extends Duplex {
  private chunks: Buffer[] = [];

  _read(): void {}

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.chunks.push(Buffer.from(chunk));
    callback();
  }

  /**
   * Deliver bytes from the peer
   */
  feed(data: Buffer | string): void {
    this.push(typeof data === "string" ? Buffer.from(data, "utf8") : data);
  }

  /**
   * Deliver bytes in chunks of `chunkSize`, yielding to the event loop
   * between chunks so each arrives as its own read
   */
  async trickle(data: Buffer | string, chunkSize: number): Promise<void> {
    const bytes = typeof data === "string" ? Buffer.from(data, "utf8") : data;
    for (let offset = 0; offset < bytes.length; offset += chunkSize) {
      this.push(bytes.subarray(offset, offset + chunkSize));
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  /**
   * Peer half-closes its side
   */
  finish(): void {
    this.push(null);
  }

  written(): Buffer {
    return Buffer.concat(this.chunks);
  }
}
