import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DiskResourceStore } from "./diskResourceStore.js";
import { MemoryResourceStore } from "./memoryResourceStore.js";
import { DiscardResourceStore } from "./resourceStore.js";

const headers = new Map([["Identifier", "r1"]]);

describe("MemoryResourceStore", () => {
  it("stores a payload on a miss and reports a hit afterwards", async () => {
    const store = new MemoryResourceStore();

    const first = await store.acquireCacheSlot("r1", headers);
    expect(first.alreadyCached).toBe(false);
    await first.sink.write(Buffer.from("icon"));

    const second = await store.acquireCacheSlot("r1", headers);
    expect(second.alreadyCached).toBe(true);
    expect(store.get("r1")?.toString()).toBe("icon");
    expect(store.getCount()).toBe(1);
  });

  it("reports a hit while a payload for the identifier is still in flight", async () => {
    const store = new MemoryResourceStore();

    const first = await store.acquireCacheSlot("r1", headers);
    const second = await store.acquireCacheSlot("r1", headers);

    expect(first.alreadyCached).toBe(false);
    expect(second.alreadyCached).toBe(true);
  });

  it("frees the identifier when a slot is released without a write", async () => {
    const store = new MemoryResourceStore();

    const first = await store.acquireCacheSlot("r1", headers);
    first.release();

    expect((await store.acquireCacheSlot("r1", headers)).alreadyCached).toBe(false);
    expect(store.getCount()).toBe(0);
  });
});

describe("DiscardResourceStore", () => {
  it("never reports a hit", async () => {
    const store = new DiscardResourceStore();
    const slot = await store.acquireCacheSlot();
    await slot.sink.write(Buffer.from("icon"));

    expect((await store.acquireCacheSlot()).alreadyCached).toBe(false);
  });
});

describe("DiskResourceStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "gntp-resources-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes a payload file and reports a hit afterwards", async () => {
    const store = new DiskResourceStore(join(directory, "cache"));

    const first = await store.acquireCacheSlot("r1");
    expect(first.alreadyCached).toBe(false);
    await first.sink.write(Buffer.from("icon"));

    expect((await readFile(store.pathFor("r1"))).toString()).toBe("icon");
    expect((await store.acquireCacheSlot("r1")).alreadyCached).toBe(true);
  });

  it("reserves an identifier until its slot is released", async () => {
    const store = new DiskResourceStore(join(directory, "cache"));

    const [first, second] = await Promise.all([
      store.acquireCacheSlot("r1"),
      store.acquireCacheSlot("r1"),
    ]);
    expect([first.alreadyCached, second.alreadyCached]).toEqual([false, true]);

    first.release();
    expect((await store.acquireCacheSlot("r1")).alreadyCached).toBe(false);
  });

  it("keeps identifiers inside the cache directory", () => {
    const store = new DiskResourceStore(directory);
    expect(store.pathFor("../../etc/passwd")).toBe(join(directory, ".._.._etc_passwd"));
  });
});
