import { connect } from "net";
import type { Duplex } from "stream";
import { encodeRequest, type EncodeOptions } from "../../../packages/protocol/src/request.js";
import { parseResponse } from "../../../packages/protocol/src/response.js";
import type { OutgoingRequest, Response } from "../../../packages/protocol/src/types.js";

export type ClientOptions = {
  host: string;
  port: number;
  timeoutMs?: number; // Whole exchange, connect to close (default 10s)
  connect?: (port: number, host: string) => Duplex;
};

/**
 * GntpClient - sends one request per connection and reads the response
 */
export class GntpClient {
  constructor(private readonly options: ClientOptions) {}

  /**
   * Send a request and wait for the listener to answer and close
   */
  send(request: OutgoingRequest, encodeOptions: EncodeOptions = {}): Promise<Response> {
    const payload = encodeRequest(request, encodeOptions);
    const open = this.options.connect ?? ((port: number, host: string) => connect(port, host));

    return new Promise((resolve, reject) => {
      const socket = open(this.options.port, this.options.host);
      const chunks: Buffer[] = [];
      let settled = false;

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();

        if (err) {
          reject(err);
          return;
        }

        try {
          resolve(parseResponse(Buffer.concat(chunks)));
        } catch (parseErr) {
          reject(parseErr);
        }
      };

      const timer = setTimeout(() => {
        finish(new Error("Timed out waiting for response"));
      }, this.options.timeoutMs ?? 10000);

      socket.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.once("end", () => finish());
      socket.once("close", () => finish());
      socket.once("error", (err: Error) => finish(err));

      // Written before the connection opens; net queues it until connected
      socket.write(payload);
    });
  }
}
