/**
 * In-process store tests
 *
 * Goals
 * - The Redis behaviours the service leans on: HSETNX claims, sorted-set
 *   ordering, expiry, blocking list moves and type errors.
 */

import { describe, it, beforeEach, expect } from "vitest";
import { MemoryStore } from "../../src/infra/memory.store";
import { StoreError } from "../../src/ports/KeyValueStore";
import { FakeClock } from "../helpers";

let clock: FakeClock;
let store: MemoryStore;

beforeEach(() => {
  clock = new FakeClock();
  store = new MemoryStore(clock.now);
});

describe("MemoryStore", () => {
  it("claims a hash field only once", async () => {
    expect(await store.hsetnx("h", "confirmed_at", "1")).toBe(true);
    expect(await store.hsetnx("h", "confirmed_at", "2")).toBe(false);
    expect(await store.hget("h", "confirmed_at")).toBe("1");
  });

  it("orders sorted-set members by score, then by member", async () => {
    await store.zadd("z", "b", 10);
    await store.zadd("z", "a", 10);
    await store.zadd("z", "c", 5);
    await store.zadd("z", "late", 99);

    expect(await store.zrangeByScore("z", 0, 50, 10)).toEqual(["c", "a", "b"]);
    expect(await store.zrangeByScore("z", 0, 50, 2)).toEqual(["c", "a"]);
  });

  it("expires keys against the injected clock", async () => {
    await store.hset("h", { a: "1" });
    await store.expire("h", 60);
    expect(store.ttl("h")).toBe(60);

    clock.advance(59);
    expect(await store.hget("h", "a")).toBe("1");
    clock.advance(1);
    expect(await store.hgetall("h")).toEqual({});
    expect(store.ttl("h")).toBeNull();
  });

  it("deletes containers that become empty", async () => {
    await store.sadd("s", "x");
    await store.srem("s", "x");
    await store.hset("s", { now: "a hash" });
    expect(await store.hget("s", "now")).toBe("a hash");
  });

  it("removes list entries from either end", async () => {
    for (const v of ["a", "b", "a", "c", "a"]) await store.rpush("l", v);

    expect(await store.lrem("l", 1, "a")).toBe(1);
    expect(await store.lrange("l", 0, -1)).toEqual(["b", "a", "c", "a"]);
    expect(await store.lrem("l", -1, "a")).toBe(1);
    expect(await store.lrange("l", 0, -1)).toEqual(["b", "a", "c"]);
    expect(await store.lrem("l", 0, "a")).toBe(1);
    expect(await store.llen("l")).toBe(2);
  });

  it("wakes a blocked move when a value is pushed", async () => {
    const pending = store.blmove("q", "q:processing", "LEFT", "RIGHT", 5);
    await store.rpush("q", "update-1");

    expect(await pending).toBe("update-1");
    expect(await store.lrange("q:processing", 0, -1)).toEqual(["update-1"]);
    expect(await store.llen("q")).toBe(0);
  });

  it("times out a blocked move on an empty list", async () => {
    expect(await store.blmove("q", "q:processing", "LEFT", "RIGHT", 0.02)).toBeNull();
  });

  it("releases blocked moves on close", async () => {
    const pending = store.blmove("q", "q:processing", "LEFT", "RIGHT", 30);
    await store.close();
    expect(await pending).toBeNull();
  });

  it("throws StoreError on a type mismatch", async () => {
    await store.rpush("l", "x");
    await expect(store.hget("l", "f")).rejects.toBeInstanceOf(StoreError);
    await expect(store.hget("l", "f")).rejects.toThrow("store hget failed: WRONGTYPE l");
  });
});
