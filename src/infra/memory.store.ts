/**
 * In-process KeyValueStore.
 *
 * Mirrors the Redis semantics the service relies on: per-key types, expiry,
 * sorted-set ordering (score, then member), and blocking list moves that
 * wake up on push. Expiry is evaluated lazily against an injectable clock so
 * tests can age keys without waiting.
 */

import { KeyValueStore, ListEnd, StoreError } from "../ports/KeyValueStore";

type Entry =
  | { type: "hash"; value: Map<string, string> }
  | { type: "set"; value: Set<string> }
  | { type: "zset"; value: Map<string, number> }
  | { type: "list"; value: string[] };

interface Waiter {
  source: string;
  destination: string;
  from: ListEnd;
  to: ListEnd;
  timer: NodeJS.Timeout;
  resolve: (value: string | null) => void;
}

export class MemoryStore implements KeyValueStore {
  private readonly data = new Map<string, Entry>();
  private readonly expiresAt = new Map<string, number>();
  private waiters: Waiter[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /* ------------------------------------------------------------------ */

  private entry(key: string): Entry | undefined {
    const deadline = this.expiresAt.get(key);
    if (deadline !== undefined && deadline <= this.now()) {
      this.data.delete(key);
      this.expiresAt.delete(key);
      return undefined;
    }
    return this.data.get(key);
  }

  private drop(key: string): void {
    this.data.delete(key);
    this.expiresAt.delete(key);
  }

  private wrongType(op: string, key: string): StoreError {
    return new StoreError(op, new Error(`WRONGTYPE ${key}`));
  }

  private hash(op: string, key: string, create: boolean): Map<string, string> | undefined {
    const e = this.entry(key);
    if (!e) {
      if (!create) return undefined;
      const value = new Map<string, string>();
      this.data.set(key, { type: "hash", value });
      return value;
    }
    if (e.type !== "hash") throw this.wrongType(op, key);
    return e.value;
  }

  private set(op: string, key: string, create: boolean): Set<string> | undefined {
    const e = this.entry(key);
    if (!e) {
      if (!create) return undefined;
      const value = new Set<string>();
      this.data.set(key, { type: "set", value });
      return value;
    }
    if (e.type !== "set") throw this.wrongType(op, key);
    return e.value;
  }

  private zset(op: string, key: string, create: boolean): Map<string, number> | undefined {
    const e = this.entry(key);
    if (!e) {
      if (!create) return undefined;
      const value = new Map<string, number>();
      this.data.set(key, { type: "zset", value });
      return value;
    }
    if (e.type !== "zset") throw this.wrongType(op, key);
    return e.value;
  }

  private list(op: string, key: string, create: boolean): string[] | undefined {
    const e = this.entry(key);
    if (!e) {
      if (!create) return undefined;
      const value: string[] = [];
      this.data.set(key, { type: "list", value });
      return value;
    }
    if (e.type !== "list") throw this.wrongType(op, key);
    return e.value;
  }

  /** Redis deletes containers that become empty. */
  private prune(key: string, size: number): void {
    if (size === 0) this.drop(key);
  }

  /* hashes ----------------------------------------------------------- */

  async hget(key: string, field: string): Promise<string | null> {
    return this.hash("hget", key, false)?.get(field) ?? null;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hash("hgetall", key, false) ?? []);
  }

  async hset(key: string, fields: Record<string, string>): Promise<void> {
    const h = this.hash("hset", key, true);
    for (const [f, v] of Object.entries(fields)) h?.set(f, v);
  }

  async hsetnx(key: string, field: string, value: string): Promise<boolean> {
    const h = this.hash("hsetnx", key, true);
    if (!h || h.has(field)) return false;
    h.set(field, value);
    return true;
  }

  async hincrby(key: string, field: string, by: number): Promise<number> {
    const h = this.hash("hincrby", key, true);
    const current = Number(h?.get(field) ?? "0");
    if (!Number.isInteger(current)) throw new StoreError("hincrby", new Error("hash value is not an integer"));
    const next = current + by;
    h?.set(field, String(next));
    return next;
  }

  async hdel(key: string, field: string): Promise<void> {
    const h = this.hash("hdel", key, false);
    if (!h) return;
    h.delete(field);
    this.prune(key, h.size);
  }

  /* sets ------------------------------------------------------------- */

  async sadd(key: string, member: string): Promise<boolean> {
    const s = this.set("sadd", key, true);
    if (!s || s.has(member)) return false;
    s.add(member);
    return true;
  }

  async srem(key: string, member: string): Promise<boolean> {
    const s = this.set("srem", key, false);
    if (!s) return false;
    const removed = s.delete(member);
    this.prune(key, s.size);
    return removed;
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return this.set("sismember", key, false)?.has(member) ?? false;
  }

  async scard(key: string): Promise<number> {
    return this.set("scard", key, false)?.size ?? 0;
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.set("smembers", key, false) ?? [])];
  }

  async srandmember(key: string, count: number): Promise<string[]> {
    return [...(this.set("srandmember", key, false) ?? [])].slice(0, Math.max(0, count));
  }

  /* sorted sets ------------------------------------------------------ */

  async zadd(key: string, member: string, score: number): Promise<void> {
    this.zset("zadd", key, true)?.set(member, score);
  }

  async zrem(key: string, member: string): Promise<boolean> {
    const z = this.zset("zrem", key, false);
    if (!z) return false;
    const removed = z.delete(member);
    this.prune(key, z.size);
    return removed;
  }

  async zrangeByScore(key: string, min: number, max: number, limit: number): Promise<string[]> {
    const z = this.zset("zrangeByScore", key, false);
    if (!z) return [];
    return [...z.entries()]
      .filter(([, score]) => score >= min && score <= max)
      .sort(([ma, sa], [mb, sb]) => (sa === sb ? (ma < mb ? -1 : ma > mb ? 1 : 0) : sa - sb))
      .slice(0, Math.max(0, limit))
      .map(([member]) => member);
  }

  async zscore(key: string, member: string): Promise<number | null> {
    return this.zset("zscore", key, false)?.get(member) ?? null;
  }

  async zcard(key: string): Promise<number> {
    return this.zset("zcard", key, false)?.size ?? 0;
  }

  /* lists ------------------------------------------------------------ */

  async rpush(key: string, value: string): Promise<number> {
    const l = this.list("rpush", key, true) ?? [];
    l.push(value);
    const len = l.length;
    this.wake(key);
    return len;
  }

  async lpush(key: string, value: string): Promise<number> {
    const l = this.list("lpush", key, true) ?? [];
    l.unshift(value);
    const len = l.length;
    this.wake(key);
    return len;
  }

  async lpop(key: string): Promise<string | null> {
    const l = this.list("lpop", key, false);
    if (!l) return null;
    const v = l.shift() ?? null;
    this.prune(key, l.length);
    return v;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const l = this.list("lrange", key, false);
    if (!l) return [];
    const [from, to] = this.bounds(l.length, start, stop);
    return l.slice(from, to + 1);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const l = this.list("ltrim", key, false);
    if (!l) return;
    const [from, to] = this.bounds(l.length, start, stop);
    const kept = l.slice(from, to + 1);
    l.splice(0, l.length, ...kept);
    this.prune(key, l.length);
  }

  async llen(key: string): Promise<number> {
    return this.list("llen", key, false)?.length ?? 0;
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    const l = this.list("lrem", key, false);
    if (!l) return 0;
    let removed = 0;
    const limit = count === 0 ? Infinity : Math.abs(count);
    if (count >= 0) {
      for (let i = 0; i < l.length && removed < limit; ) {
        if (l[i] === value) {
          l.splice(i, 1);
          removed++;
        } else {
          i++;
        }
      }
    } else {
      for (let i = l.length - 1; i >= 0 && removed < limit; i--) {
        if (l[i] === value) {
          l.splice(i, 1);
          removed++;
        }
      }
    }
    this.prune(key, l.length);
    return removed;
  }

  async lmove(source: string, destination: string, from: ListEnd, to: ListEnd): Promise<string | null> {
    return this.move(source, destination, from, to);
  }

  async blmove(
    source: string,
    destination: string,
    from: ListEnd,
    to: ListEnd,
    timeoutSeconds: number
  ): Promise<string | null> {
    if (!(timeoutSeconds > 0)) {
      throw new StoreError("blmove", new Error("timeout must be positive"));
    }
    const moved = this.move(source, destination, from, to);
    if (moved !== null) return moved;
    return new Promise<string | null>((resolve) => {
      const waiter: Waiter = {
        source,
        destination,
        from,
        to,
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutSeconds * 1000)
      };
      this.waiters.push(waiter);
    });
  }

  /* keys ------------------------------------------------------------- */

  async expire(key: string, seconds: number): Promise<void> {
    if (!this.entry(key)) return;
    if (seconds <= 0) {
      this.drop(key);
      return;
    }
    this.expiresAt.set(key, this.now() + seconds * 1000);
  }

  async del(key: string): Promise<void> {
    this.drop(key);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    const pending = this.waiters;
    this.waiters = [];
    for (const w of pending) {
      clearTimeout(w.timer);
      w.resolve(null);
    }
  }

  /** Remaining time to live in seconds, or null when the key has no expiry. */
  ttl(key: string): number | null {
    if (!this.entry(key)) return null;
    const deadline = this.expiresAt.get(key);
    return deadline === undefined ? null : Math.ceil((deadline - this.now()) / 1000);
  }

  /* ------------------------------------------------------------------ */

  private bounds(len: number, start: number, stop: number): [number, number] {
    const from = Math.max(0, start < 0 ? len + start : start);
    const to = Math.min(len - 1, stop < 0 ? len + stop : stop);
    return [from, to];
  }

  private move(source: string, destination: string, from: ListEnd, to: ListEnd): string | null {
    const src = this.list("lmove", source, false);
    if (!src || src.length === 0) return null;
    const dst = this.list("lmove", destination, true) ?? [];
    const value = from === "LEFT" ? src.shift() : src.pop();
    if (value === undefined) return null;
    if (to === "LEFT") dst.unshift(value);
    else dst.push(value);
    if (source !== destination) this.prune(source, src.length);
    this.wake(destination);
    return value;
  }

  private wake(key: string): void {
    while (true) {
      const waiter = this.waiters.find((w) => w.source === key);
      if (!waiter) return;
      const value = this.move(waiter.source, waiter.destination, waiter.from, waiter.to);
      if (value === null) return;
      this.waiters = this.waiters.filter((w) => w !== waiter);
      clearTimeout(waiter.timer);
      waiter.resolve(value);
    }
  }
}
