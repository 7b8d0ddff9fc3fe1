/**
 * Redis-backed KeyValueStore (ioredis).
 *
 * Two connections:
 * - `client` runs every non-blocking command under `commandTimeout`.
 * - `blocking` serves BLMOVE only. It has no command timeout of its own; the
 *   BLMOVE timeout bounds it, and a blocking call never stalls other commands.
 *
 * Every failure surfaces as StoreError so loops can tell store trouble apart
 * from handler bugs.
 */

import IORedis from "ioredis";
import { KeyValueStore, ListEnd, StoreError } from "../ports/KeyValueStore";
import { createLogger } from "./logger";

const log = createLogger("store.redis");

export interface RedisStoreOptions {
  url: string;
  commandTimeoutMs: number;
}

export class RedisStore implements KeyValueStore {
  private readonly client: IORedis;
  private readonly blocking: IORedis;

  constructor(opts: RedisStoreOptions) {
    this.client = new IORedis(opts.url, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: false,
      commandTimeout: opts.commandTimeoutMs
    });
    this.blocking = new IORedis(opts.url, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false
    });
    for (const [name, conn] of [["client", this.client], ["blocking", this.blocking]] as const) {
      conn.on("error", (err: Error) => log.warn("redis connection error", { connection: name, error: err.message }));
    }
  }

  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreError(op, err);
    }
  }

  hget(key: string, field: string): Promise<string | null> {
    return this.run("hget", () => this.client.hget(key, field));
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.run("hgetall", () => this.client.hgetall(key));
  }

  async hset(key: string, fields: Record<string, string>): Promise<void> {
    if (Object.keys(fields).length === 0) return;
    await this.run("hset", () => this.client.hset(key, fields));
  }

  async hsetnx(key: string, field: string, value: string): Promise<boolean> {
    return (await this.run("hsetnx", () => this.client.hsetnx(key, field, value))) === 1;
  }

  hincrby(key: string, field: string, by: number): Promise<number> {
    return this.run("hincrby", () => this.client.hincrby(key, field, by));
  }

  async hdel(key: string, field: string): Promise<void> {
    await this.run("hdel", () => this.client.hdel(key, field));
  }

  async sadd(key: string, member: string): Promise<boolean> {
    return (await this.run("sadd", () => this.client.sadd(key, member))) === 1;
  }

  async srem(key: string, member: string): Promise<boolean> {
    return (await this.run("srem", () => this.client.srem(key, member))) === 1;
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return (await this.run("sismember", () => this.client.sismember(key, member))) === 1;
  }

  scard(key: string): Promise<number> {
    return this.run("scard", () => this.client.scard(key));
  }

  smembers(key: string): Promise<string[]> {
    return this.run("smembers", () => this.client.smembers(key));
  }

  srandmember(key: string, count: number): Promise<string[]> {
    return this.run("srandmember", () => this.client.srandmember(key, count));
  }

  async zadd(key: string, member: string, score: number): Promise<void> {
    await this.run("zadd", () => this.client.zadd(key, score, member));
  }

  async zrem(key: string, member: string): Promise<boolean> {
    return (await this.run("zrem", () => this.client.zrem(key, member))) === 1;
  }

  zrangeByScore(key: string, min: number, max: number, limit: number): Promise<string[]> {
    return this.run("zrangeByScore", () => this.client.zrangebyscore(key, min, max, "LIMIT", 0, limit));
  }

  async zscore(key: string, member: string): Promise<number | null> {
    const raw = await this.run("zscore", () => this.client.zscore(key, member));
    return raw === null ? null : Number(raw);
  }

  zcard(key: string): Promise<number> {
    return this.run("zcard", () => this.client.zcard(key));
  }

  rpush(key: string, value: string): Promise<number> {
    return this.run("rpush", () => this.client.rpush(key, value));
  }

  lpush(key: string, value: string): Promise<number> {
    return this.run("lpush", () => this.client.lpush(key, value));
  }

  lpop(key: string): Promise<string | null> {
    return this.run("lpop", () => this.client.lpop(key));
  }

  lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.run("lrange", () => this.client.lrange(key, start, stop));
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.run("ltrim", () => this.client.ltrim(key, start, stop));
  }

  llen(key: string): Promise<number> {
    return this.run("llen", () => this.client.llen(key));
  }

  lrem(key: string, count: number, value: string): Promise<number> {
    return this.run("lrem", () => this.client.lrem(key, count, value));
  }

  async lmove(source: string, destination: string, from: ListEnd, to: ListEnd): Promise<string | null> {
    const raw = await this.run("lmove", () => this.client.call("LMOVE", source, destination, from, to));
    return asOptionalString("lmove", raw);
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
    const raw = await this.run("blmove", () =>
      this.blocking.call("BLMOVE", source, destination, from, to, String(timeoutSeconds))
    );
    return asOptionalString("blmove", raw);
  }

  async expire(key: string, seconds: number): Promise<void> {
    await this.run("expire", () => this.client.expire(key, seconds));
  }

  async del(key: string): Promise<void> {
    await this.run("del", () => this.client.del(key));
  }

  async ping(): Promise<void> {
    await this.run("ping", () => this.client.ping());
  }

  async close(): Promise<void> {
    // The blocking connection may be parked in BLMOVE; disconnect instead of QUIT.
    this.blocking.disconnect();
    await this.run("close", () => this.client.quit());
  }
}

function asOptionalString(op: string, raw: unknown): string | null {
  if (raw === null || typeof raw === "string") return raw;
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  throw new StoreError(op, new Error(`unexpected reply type ${typeof raw}`));
}
