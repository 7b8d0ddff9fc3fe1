/**
 * Due-time scheduler for the one-shot follow-up.
 *
 * Per subject: UNSCHEDULED -> SCHEDULED(fire_at) -> FIRED. Only `reset`
 * (a fresh /start) takes a FIRED subject back to UNSCHEDULED.
 *
 * Store layout
 * - {p}followup:due       sorted set, member = subject id, score = fire time (unix s)
 * - subject.followup_idx  fired-count guard
 *
 * Firing rules
 * - `poll` reads due members oldest first and ZREMs each one before the
 *   action runs. Only the caller whose ZREM removed the member goes on, so
 *   two processes polling the same index never both act on one entry.
 * - The action sees a subject only while followup_idx < threshold, and must
 *   `claim()` (HINCRBY) before it sends anything. A claim that overshoots
 *   the threshold means another path got there first.
 * - A failing action is logged. The entry is already gone and is not put back.
 */

import { Logger, createLogger, errorMessage } from "../infra/logger";
import type { KeyValueStore } from "../ports/KeyValueStore";
import { pause } from "../engine/pause";
import type { StoreKeys } from "../store/keys";

export interface DueSubject {
  subjectId: string;
  /** Atomically take the firing slot. False when it was already taken. */
  claim(): Promise<boolean>;
}

export type DueAction = (due: DueSubject) => Promise<void>;

export interface FollowupSchedulerOptions {
  batchSize: number;
  idleMs: number;
  /** Allowed firings per cycle. */
  threshold?: number;
  now?: () => number;
  logger?: Logger;
}

export class FollowupScheduler {
  private readonly threshold: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: StoreKeys,
    private readonly opts: FollowupSchedulerOptions
  ) {
    this.threshold = opts.threshold ?? 1;
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? createLogger("followup");
  }

  /** Upsert the due time to now + delaySeconds. */
  async schedule(subjectId: string, delaySeconds: number): Promise<number> {
    const fireAt = Math.floor(this.now() / 1000) + delaySeconds;
    await this.store.zadd(this.keys.followupDue, subjectId, fireAt);
    return fireAt;
  }

  async unschedule(subjectId: string): Promise<boolean> {
    return this.store.zrem(this.keys.followupDue, subjectId);
  }

  /** Back to UNSCHEDULED: clears the fired-count and any outstanding entry. */
  async reset(subjectId: string): Promise<void> {
    await this.store.hset(this.keys.subject(subjectId), { followup_idx: "0" });
    await this.store.zrem(this.keys.followupDue, subjectId);
  }

  async firedCount(subjectId: string): Promise<number> {
    const raw = await this.store.hget(this.keys.subject(subjectId), "followup_idx");
    const n = Number(raw ?? "0");
    return Number.isFinite(n) ? n : 0;
  }

  dueAt(subjectId: string): Promise<number | null> {
    return this.store.zscore(this.keys.followupDue, subjectId);
  }

  size(): Promise<number> {
    return this.store.zcard(this.keys.followupDue);
  }

  /**
   * Run the action for every entry due now (at most `batchSize`).
   * Returns how many entries this call took off the index.
   */
  async poll(action: DueAction, batchSize: number = this.opts.batchSize): Promise<number> {
    const nowSeconds = Math.floor(this.now() / 1000);
    const due = await this.store.zrangeByScore(this.keys.followupDue, 0, nowSeconds, batchSize);
    let taken = 0;
    for (const subjectId of due) {
      if (!(await this.store.zrem(this.keys.followupDue, subjectId))) continue;
      taken++;
      if ((await this.firedCount(subjectId)) >= this.threshold) {
        this.log.debug("follow-up already fired", { subjectId });
        continue;
      }
      try {
        await action({ subjectId, claim: () => this.claim(subjectId) });
      } catch (err) {
        this.log.warn("follow-up action failed", { subjectId, error: errorMessage(err) });
      }
    }
    return taken;
  }

  /** Poll until `signal` aborts, sleeping idleMs whenever nothing was due. */
  async run(action: DueAction, signal: AbortSignal): Promise<void> {
    this.log.info("follow-up scheduler started", { batchSize: this.opts.batchSize, idleMs: this.opts.idleMs });
    while (!signal.aborted) {
      let taken = 0;
      try {
        taken = await this.poll(action);
      } catch (err) {
        this.log.warn("follow-up poll failed", { error: errorMessage(err) });
      }
      if (taken === 0) await pause(this.opts.idleMs, signal);
    }
    this.log.info("follow-up scheduler stopped");
  }

  private async claim(subjectId: string): Promise<boolean> {
    const count = await this.store.hincrby(this.keys.subject(subjectId), "followup_idx", 1);
    return count <= this.threshold;
  }
}
