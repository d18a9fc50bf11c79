import { mkdir, stat, writeFile } from "fs/promises";
import { join } from "path";
import type { HeaderBlock } from "../../../../packages/protocol/src/types.js";
import { CACHE_HIT, type CacheSlot, type ResourceStore } from "./resourceStore.js";

/**
 * Persists payloads as files in a cache directory.
 * A file that already exists for the identifier is a cache hit.
 */
export class DiskResourceStore implements ResourceStore {
  private pending: Set<string> = new Set(); // Paths whose payload is still being read

  constructor(private readonly directory: string) {}

  /**
   * Cache file for an identifier (path separators and other unsafe
   * characters are replaced)
   */
  pathFor(identifier: string): string {
    return join(this.directory, identifier.replace(/[^A-Za-z0-9._-]/g, "_"));
  }

  async acquireCacheSlot(identifier: string, _headers?: HeaderBlock): Promise<CacheSlot> {
    const path = this.pathFor(identifier);
    if (this.pending.has(path)) {
      return CACHE_HIT;
    }

    // Reserved before the stat so a concurrent acquire cannot slip in
    this.pending.add(path);
    const release = () => {
      this.pending.delete(path);
    };

    let cached: boolean;
    try {
      cached = await this.exists(path);
    } catch (err) {
      release();
      throw err;
    }
    if (cached) {
      release();
      return CACHE_HIT;
    }

    return {
      alreadyCached: false,
      sink: {
        write: async (data: Buffer) => {
          await mkdir(this.directory, { recursive: true });
          await writeFile(path, data);
        },
      },
      release,
    };
  }

  private async exists(path: string): Promise<boolean> {
    try {
      const info = await stat(path);
      return info.isFile();
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return false;
      }
      throw err;
    }
  }
}
