import {
  BLOCK_DELIMITER,
  LINE_TERMINATOR,
  MAX_LINE_LENGTH,
} from "../../../protocol/src/constants.js";
import { decrypt } from "../../../protocol/src/crypto.js";
import { InvalidRequestError } from "../../../protocol/src/errors.js";
import type { CipherSpec } from "../../../protocol/src/types.js";

/**
 * Thrown when the peer closes the stream before the request is complete.
 * Not a protocol error: there is nobody left to answer.
 */
export class EndOfStreamError extends Error {
  constructor(message = "Stream ended before request was complete") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * BlockReader turns pushed chunks into pull-style reads.
 *
 * Responsibilities:
 * - Newline-terminated lines (a trailing \r is dropped)
 * - Exact-length byte runs
 * - Ciphertext blocks terminated by CRLF CRLF, decrypted and pushed back
 *   so they are read as ordinary lines
 *
 * Does NOT:
 * - Own the socket
 * - Interpret headers
 *
 * One reader serves one sequential consumer; concurrent reads are not
 * supported.
 */
export class BlockReader {
  private buffer: Buffer = Buffer.alloc(0);
  private ended: boolean = false;
  private waiter: (() => void) | null = null;

  constructor(private readonly maxLineLength: number = MAX_LINE_LENGTH) {}

  /**
   * Append received bytes
   */
  push(chunk: Buffer): void {
    if (this.ended) return;
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    this.wake();
  }

  /**
   * No more bytes will arrive; pending and future reads drain the buffer
   * and then report end of stream
   */
  end(): void {
    this.ended = true;
    this.wake();
  }

  /**
   * Put bytes back in front of the buffer
   */
  unshift(data: Buffer): void {
    this.buffer = Buffer.concat([data, this.buffer]);
  }

  /**
   * Bytes received but not yet consumed
   */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  /**
   * Read one line without its terminator
   */
  async readLine(): Promise<string> {
    while (true) {
      const newline = this.buffer.indexOf(NEWLINE);
      if (newline !== -1) {
        let end = newline;
        if (end > 0 && this.buffer[end - 1] === CARRIAGE_RETURN) {
          end--;
        }
        const line = this.buffer.subarray(0, end).toString("utf8");
        this.buffer = this.buffer.subarray(newline + 1);
        return line;
      }

      if (this.buffer.length > this.maxLineLength) {
        throw new InvalidRequestError(
          `Line exceeded limit: ${this.buffer.length} bytes`
        );
      }

      await this.waitForData();
    }
  }

  /**
   * Read exactly `length` bytes
   */
  async readBytes(length: number): Promise<Buffer> {
    while (this.buffer.length < length) {
      await this.waitForData();
    }

    const bytes = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return bytes;
  }

  /**
   * Read up to (not including) the delimiter and consume the delimiter
   */
  async readUntil(delimiter: Buffer): Promise<Buffer> {
    let searchFrom = 0;
    while (true) {
      const index = this.buffer.indexOf(delimiter, searchFrom);
      if (index !== -1) {
        const block = this.buffer.subarray(0, index);
        this.buffer = this.buffer.subarray(index + delimiter.length);
        return block;
      }

      if (this.buffer.length > this.maxLineLength) {
        throw new InvalidRequestError(
          `Block exceeded limit: ${this.buffer.length} bytes`
        );
      }

      // Delimiter may straddle the next chunk
      searchFrom = Math.max(0, this.buffer.length - delimiter.length + 1);
      await this.waitForData();
    }
  }

  /**
   * Decrypt the header block that follows the request line.
   *
   * The plaintext is pushed back with a closing blank line, standing in
   * for the CRLF CRLF that terminated the ciphertext.
   */
  async decryptNextBlock(cipher: CipherSpec): Promise<void> {
    const ciphertext = await this.readUntil(BLOCK_DELIMITER);
    const plaintext = decrypt(cipher, ciphertext, "header block");

    const endsWithNewline =
      plaintext.length === 0 || plaintext[plaintext.length - 1] === NEWLINE;
    const terminator = endsWithNewline
      ? LINE_TERMINATOR
      : LINE_TERMINATOR + LINE_TERMINATOR;

    this.unshift(Buffer.concat([plaintext, Buffer.from(terminator, "latin1")]));
  }

  /**
   * Read `length` wire bytes and decrypt them
   */
  async readDecryptedBytes(length: number, cipher: CipherSpec): Promise<Buffer> {
    const ciphertext = await this.readBytes(length);
    return decrypt(cipher, ciphertext, "resource data");
  }

  /**
   * Wait until more bytes arrive or the stream ends
   */
  private waitForData(): Promise<void> {
    if (this.ended) {
      return Promise.reject(new EndOfStreamError());
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
