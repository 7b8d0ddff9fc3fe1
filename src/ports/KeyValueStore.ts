/**
 * KeyValueStore
 *
 * Purpose
 * - The only shared mutable resource of the service. It is the durable
 *   inbound queue, the follow-up due index, the payment ledger, the dedup
 *   records and the retry buffer.
 * - Every operation is a single-key atomic mutation. No invariant of the
 *   service needs a multi-key transaction.
 *
 * Drivers
 * - "redis": infra/redis.store.ts (ioredis). Production.
 * - "memory": infra/memory.store.ts. Tests and local runs.
 *
 * Errors
 * - Implementations throw StoreError. Background loops are the boundary that
 *   catches, logs and backs off.
 */

export type ListEnd = "LEFT" | "RIGHT";

export interface KeyValueStore {
  /* hashes */
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, fields: Record<string, string>): Promise<void>;
  /** Set `field` only when absent. Returns true when this call wrote it. */
  hsetnx(key: string, field: string, value: string): Promise<boolean>;
  hincrby(key: string, field: string, by: number): Promise<number>;
  hdel(key: string, field: string): Promise<void>;

  /* sets */
  sadd(key: string, member: string): Promise<boolean>;
  srem(key: string, member: string): Promise<boolean>;
  sismember(key: string, member: string): Promise<boolean>;
  scard(key: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  /** Up to `count` distinct members, in no particular order. */
  srandmember(key: string, count: number): Promise<string[]>;

  /* sorted sets */
  zadd(key: string, member: string, score: number): Promise<void>;
  /** Returns true when the member existed and this call removed it. */
  zrem(key: string, member: string): Promise<boolean>;
  /** Members with min <= score <= max, lowest score first, at most `limit`. */
  zrangeByScore(key: string, min: number, max: number, limit: number): Promise<string[]>;
  zscore(key: string, member: string): Promise<number | null>;
  zcard(key: string): Promise<number>;

  /* lists */
  rpush(key: string, value: string): Promise<number>;
  lpush(key: string, value: string): Promise<number>;
  lpop(key: string): Promise<string | null>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ltrim(key: string, start: number, stop: number): Promise<void>;
  llen(key: string): Promise<number>;
  /** Remove up to `count` occurrences of `value`. */
  lrem(key: string, count: number, value: string): Promise<number>;
  lmove(source: string, destination: string, from: ListEnd, to: ListEnd): Promise<string | null>;
  /**
   * Blocking lmove. Resolves null when nothing arrived within `timeoutSeconds`.
   * The timeout must be positive: no caller may block indefinitely.
   */
  blmove(source: string, destination: string, from: ListEnd, to: ListEnd, timeoutSeconds: number): Promise<string | null>;

  /* keys */
  expire(key: string, seconds: number): Promise<void>;
  del(key: string): Promise<void>;

  ping(): Promise<void>;
  close(): Promise<void>;
}

export class StoreError extends Error {
  readonly op: string;

  constructor(op: string, cause: unknown) {
    super(`store ${op} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StoreError";
    this.op = op;
  }
}
