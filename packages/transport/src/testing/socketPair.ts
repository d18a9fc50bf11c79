import { Duplex } from "stream";

/**
 * One end of an in-process socket pair. Writes surface as reads on the peer;
 * ending this side ends the peer's readable side.
 */
export class PairedSocket extends Duplex {
  peer?: PairedSocket;

  _read(): void {}

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.peer?.push(Buffer.from(chunk));
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.peer?.push(null);
    callback();
  }
}

export function socketPair(): [PairedSocket, PairedSocket] {
  const left = new PairedSocket();
  const right = new PairedSocket();
  left.peer = right;
  right.peer = left;
  return [left, right];
}
