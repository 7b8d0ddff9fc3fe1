/**
 * Subject records.
 *
 * Hash fields ({p}subject:{id}):
 *   chat_id       delivery address on the chat platform
 *   paid          "1" once a payment is confirmed
 *   owner         instance tag of the process that created the record
 *   followup_idx  fired-count of the one-shot follow-up (owned by the scheduler)
 *   cycle_count   number of /start resets
 *   tracking      JSON object of campaign parameters from the /start payload
 *   created_at, updated_at, paid_at   unix seconds
 *
 * Every write refreshes the hash expiry, so inactive subjects age out.
 */

import type { KeyValueStore } from "../ports/KeyValueStore";
import type { StoreKeys } from "../store/keys";
import { Tracking, TrackingSchema } from "../types/notifications";

const SUBJECT_ID = /^[A-Za-z0-9_-]{1,64}$/;

/** Subject ids are opaque, but only this alphabet is accepted from outside. */
export function isSubjectId(v: unknown): v is string {
  return typeof v === "string" && SUBJECT_ID.test(v);
}

export interface Subject {
  id: string;
  chatId: string | null;
  paid: boolean;
  owner: string | null;
  followupIdx: number;
  cycleCount: number;
  tracking: Tracking;
}

export interface SubjectRepositoryOptions {
  ttlSeconds: number;
  instanceTag: string;
  now?: () => number;
}

export class SubjectRepository {
  private readonly now: () => number;

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: StoreKeys,
    private readonly opts: SubjectRepositoryOptions
  ) {
    this.now = opts.now ?? Date.now;
  }

  get instanceTag(): string {
    return this.opts.instanceTag;
  }

  async get(id: string): Promise<Subject | null> {
    const h = await this.store.hgetall(this.keys.subject(id));
    if (Object.keys(h).length === 0) return null;
    return {
      id,
      chatId: h.chat_id || null,
      paid: h.paid === "1",
      owner: h.owner || null,
      followupIdx: toInt(h.followup_idx),
      cycleCount: toInt(h.cycle_count),
      tracking: parseTracking(h.tracking)
    };
  }

  async chatIdOf(id: string): Promise<string | null> {
    return (await this.store.hget(this.keys.subject(id), "chat_id")) || null;
  }

  /**
   * Create or refresh the record for an inbound interaction. A fresh cycle
   * (/start) also increments cycle_count and replaces tracking parameters
   * when new ones are supplied. Paid subjects keep their flag.
   */
  async touch(id: string, chatId: string, opts: { newCycle: boolean; tracking?: Tracking }): Promise<void> {
    const key = this.keys.subject(id);
    const ts = this.seconds();
    await this.store.hsetnx(key, "created_at", ts);
    await this.store.hsetnx(key, "paid", "0");
    await this.store.hset(key, {
      chat_id: chatId,
      owner: this.opts.instanceTag,
      updated_at: ts,
      ...(opts.tracking && Object.keys(opts.tracking).length > 0 ? { tracking: JSON.stringify(opts.tracking) } : {})
    });
    if (opts.newCycle) await this.store.hincrby(key, "cycle_count", 1);
    await this.store.expire(key, this.opts.ttlSeconds);
  }

  async markPaid(id: string): Promise<void> {
    const key = this.keys.subject(id);
    await this.store.hset(key, { paid: "1", updated_at: this.seconds() });
    await this.store.hsetnx(key, "paid_at", this.seconds());
    await this.store.expire(key, this.opts.ttlSeconds);
  }

  async isPaid(id: string): Promise<boolean> {
    return (await this.store.hget(this.keys.subject(id), "paid")) === "1";
  }

  async markBlocked(id: string): Promise<void> {
    await this.store.sadd(this.keys.blocked, id);
  }

  async unblock(id: string): Promise<void> {
    await this.store.srem(this.keys.blocked, id);
  }

  isBlocked(id: string): Promise<boolean> {
    return this.store.sismember(this.keys.blocked, id);
  }

  private seconds(): string {
    return String(Math.floor(this.now() / 1000));
  }
}

function toInt(raw: string | undefined): number {
  const n = Number(raw ?? "0");
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

function parseTracking(raw: string | undefined): Tracking {
  if (!raw) return {};
  try {
    const parsed = TrackingSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}
