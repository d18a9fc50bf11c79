import type { HeaderBlock } from "../../../../packages/protocol/src/types.js";
import { CACHE_HIT, type CacheSlot, type ResourceStore } from "./resourceStore.js";

/**
 * Keeps payloads in memory, keyed by identifier
 */
export class MemoryResourceStore implements ResourceStore {
  private payloads: Map<string, Buffer> = new Map();
  private pending: Set<string> = new Set(); // Misses still being read

  async acquireCacheSlot(identifier: string, _headers?: HeaderBlock): Promise<CacheSlot> {
    if (this.payloads.has(identifier) || this.pending.has(identifier)) {
      return CACHE_HIT;
    }

    this.pending.add(identifier);
    return {
      alreadyCached: false,
      sink: {
        write: async (data: Buffer) => {
          this.payloads.set(identifier, Buffer.from(data));
        },
      },
      release: () => {
        this.pending.delete(identifier);
      },
    };
  }

  get(identifier: string): Buffer | undefined {
    return this.payloads.get(identifier);
  }

  getCount(): number {
    return this.payloads.size;
  }
}
