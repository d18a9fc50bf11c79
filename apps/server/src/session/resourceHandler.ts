import { Headers } from "../../../../packages/protocol/src/constants.js";
import { InvalidRequestError } from "../../../../packages/protocol/src/errors.js";
import { parseNonNegativeInteger } from "../../../../packages/protocol/src/headers.js";
import type {
  CipherSpec,
  HeaderBlock,
  Resource,
} from "../../../../packages/protocol/src/types.js";
import type { BlockReader } from "../../../../packages/transport/src/connection/blockReader.js";
import { logger } from "../observability/logger.js";
import type { CacheSlot, ResourceStore } from "../resources/resourceStore.js";

/**
 * Handle one resource block once its headers are complete
 *
 * Wire layout after the header block:
 * | payload (Length bytes, encrypted as the request) | blank line |
 */
export class ResourceHandler {
  constructor(
    private readonly reader: BlockReader,
    private readonly store: ResourceStore,
    private readonly maxResourceBytes: number,
    private readonly connectionId: string
  ) {}

  async read(headers: HeaderBlock, cipher: CipherSpec): Promise<Resource> {
    const identifier = headers.get(Headers.RESOURCE_IDENTIFIER);
    if (!identifier) {
      throw new InvalidRequestError("Resource block without Identifier");
    }

    const rawLength = headers.get(Headers.RESOURCE_LENGTH);
    const length = parseNonNegativeInteger(rawLength);
    if (length === undefined) {
      throw new InvalidRequestError(
        `Invalid Length for resource ${identifier}: ${rawLength ?? "(missing)"}`
      );
    }
    if (length > this.maxResourceBytes) {
      throw new InvalidRequestError(
        `Resource ${identifier} exceeds limit: ${length} bytes`
      );
    }

    const slot = await this.store.acquireCacheSlot(identifier, headers);

    const data = await this.readPayload(slot, length, cipher);
    logger.resource(this.connectionId, identifier, data.length, slot.alreadyCached);

    const trailer = await this.reader.readLine();
    if (trailer.trim() !== "") {
      throw new InvalidRequestError(
        `Expected blank line after resource ${identifier}, not: ${trailer}`
      );
    }

    return { identifier, length, data, cached: slot.alreadyCached };
  }
  /**
   * The payload is consumed even on a cache hit to keep the stream aligned
   */
  private async readPayload(
    slot: CacheSlot,
    length: number,
    cipher: CipherSpec
  ): Promise<Buffer> {
    try {
      const data = await this.reader.readDecryptedBytes(length, cipher);
      if (!slot.alreadyCached) {
        await slot.sink.write(data);
      }
      return data;
    } finally {
      slot.release();
    }
  }
}
