/**
 * Funnel metrics: a capped event log plus global and per-day counters.
 * Recording never fails the caller; store errors are logged at debug level.
 */

import { createLogger, errorMessage } from "../infra/logger";
import type { KeyValueStore } from "../ports/KeyValueStore";
import type { StoreKeys } from "../store/keys";

const EVENTS_CAP = 2000;
const DAY_TTL_SECONDS = 60 * 24 * 60 * 60;

export type FunnelEvent =
  | "start"
  | "checkout_created"
  | "checkout_reused"
  | "checkout_failed"
  | "checkout_reminder_sent"
  | "followup_sent"
  | "verify_clicked"
  | "payment_confirmed"
  | "payment_failed"
  | "access_delivered"
  | "subject_blocked";

export interface FunnelExtra {
  subjectId?: string;
  amount?: number;
  [key: string]: string | number | undefined;
}

const log = createLogger("funnel");

export function utcDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export class FunnelMetrics {
  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: StoreKeys,
    private readonly now: () => number = Date.now
  ) {}

  async record(event: FunnelEvent, extra: FunnelExtra = {}): Promise<void> {
    const ms = this.now();
    const day = this.keys.funnelDay(utcDay(ms));
    try {
      await this.store.lpush(this.keys.funnelEvents, JSON.stringify({ ts: Math.floor(ms / 1000), event, ...extra }));
      await this.store.ltrim(this.keys.funnelEvents, 0, EVENTS_CAP - 1);
      await this.store.hincrby(this.keys.funnelCounters, "events_total", 1);
      await this.store.hincrby(this.keys.funnelCounters, event, 1);
      await this.store.hincrby(day, "events_total", 1);
      await this.store.hincrby(day, event, 1);
      await this.store.expire(day, DAY_TTL_SECONDS);
      await this.store.sadd(this.keys.funnelDays, day);
    } catch (err) {
      log.debug("funnel record failed", { event, error: errorMessage(err) });
    }
  }

  counters(): Promise<Record<string, string>> {
    return this.store.hgetall(this.keys.funnelCounters);
  }

  today(): Promise<Record<string, string>> {
    return this.store.hgetall(this.keys.funnelDay(utcDay(this.now())));
  }

  /** Drops the event log and every counter. Returns how many day keys went. */
  async reset(): Promise<number> {
    const days = await this.store.smembers(this.keys.funnelDays);
    for (const day of days) await this.store.del(day);
    await this.store.del(this.keys.funnelDays);
    await this.store.del(this.keys.funnelEvents);
    await this.store.del(this.keys.funnelCounters);
    log.info("funnel reset", { days: days.length });
    return days.length;
  }
}
