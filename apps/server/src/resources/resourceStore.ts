import type { HeaderBlock } from "../../../../packages/protocol/src/types.js";

/**
 * Destination for one payload
 */
export interface ResourceSink {
  write(data: Buffer): Promise<void>;
}

export type CacheSlot = {
  alreadyCached: boolean;
  sink: ResourceSink;
  release: () => void; // Ends the reservation a miss holds on its identifier
};

/**
 * ResourceStore decides whether a payload is already held.
 *
 * The caller always reads the full payload off the wire; on a hit it is
 * simply not written to the sink. A miss reserves the identifier until the
 * caller releases the slot, so a concurrent request sending the same
 * identifier sees a hit instead of writing it a second time.
 */
export interface ResourceStore {
  acquireCacheSlot(identifier: string, headers: HeaderBlock): Promise<CacheSlot>;
}

export const discardSink: ResourceSink = {
  async write() {},
};

export const CACHE_HIT: CacheSlot = {
  alreadyCached: true,
  sink: discardSink,
  release: () => {},
};

/**
 * Never caches; every payload is read and dropped
 */
export class DiscardResourceStore implements ResourceStore {
  async acquireCacheSlot(): Promise<CacheSlot> {
    return { alreadyCached: false, sink: discardSink, release: () => {} };
  }
}
