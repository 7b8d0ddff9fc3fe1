/**
 * Retry queue for outbound notifications ({p}retry, a list).
 *
 * Items are JSON: { sink, payload, reason, attempt, enqueuedAt }.
 * - `enqueue` appends with attempt = 1.
 * - `drain` takes at most min(maxItems, current length) items from the head,
 *   so an item re-appended in this cycle is not tried again until the next.
 * - A failed send goes back to the tail with attempt + 1, unless attempt has
 *   reached maxAttempts; then it is dropped with a log line.
 * - Items that no longer parse, and failures of kind `config`, are dropped.
 * - An item that was popped but could not be re-appended (store down) is lost.
 */

import { z } from "zod";
import { Logger, createLogger, errorMessage } from "../infra/logger";
import type { KeyValueStore } from "../ports/KeyValueStore";
import { pause } from "../engine/pause";
import { EventNotificationSchema, OrderNotificationSchema } from "../types/notifications";
import { PortError, Result, describeError } from "../types/result";

const Common = {
  reason: z.string(),
  attempt: z.number().int().positive(),
  enqueuedAt: z.number().int().nonnegative()
};

export const RetryItemSchema = z.discriminatedUnion("sink", [
  z.object({ sink: z.literal("analytics-order"), payload: OrderNotificationSchema, ...Common }),
  z.object({ sink: z.literal("analytics-event"), payload: EventNotificationSchema, ...Common }),
  z.object({ sink: z.literal("delivery"), payload: z.object({ subjectId: z.string().min(1) }), ...Common })
]);
export type RetryItem = z.infer<typeof RetryItemSchema>;
export type RetrySink = RetryItem["sink"];

type PickSinkPayload<T> = T extends { sink: infer S; payload: infer P } ? { sink: S; payload: P } : never;
export type RetryEntry = PickSinkPayload<RetryItem>;

export type RetrySenders = {
  [S in RetrySink]: (payload: Extract<RetryItem, { sink: S }>["payload"]) => Promise<Result<unknown>>;
};

export interface DrainReport {
  delivered: number;
  requeued: number;
  dropped: number;
}

export interface RetryQueueOptions {
  maxAttempts: number;
  batchSize: number;
  intervalMs: number;
  now?: () => number;
  logger?: Logger;
}

export class RetryQueue {
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly store: KeyValueStore,
    private readonly key: string,
    private readonly opts: RetryQueueOptions
  ) {
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? createLogger("retry");
  }

  async enqueue(entry: RetryEntry, reason: string): Promise<void> {
    const item = { ...entry, reason, attempt: 1, enqueuedAt: Math.floor(this.now() / 1000) };
    await this.store.rpush(this.key, JSON.stringify(item));
    this.log.info("retry enqueued", { sink: entry.sink, reason });
  }

  depth(): Promise<number> {
    return this.store.llen(this.key);
  }

  async drain(senders: RetrySenders, maxItems: number = this.opts.batchSize): Promise<DrainReport> {
    const report: DrainReport = { delivered: 0, requeued: 0, dropped: 0 };
    const budget = Math.min(maxItems, await this.store.llen(this.key));
    for (let i = 0; i < budget; i++) {
      const raw = await this.store.lpop(this.key);
      if (raw === null) break;

      const item = parseItem(raw);
      if (!item) {
        this.log.warn("retry item unreadable, dropped", { raw: raw.slice(0, 200) });
        report.dropped++;
        continue;
      }

      const res = await this.send(senders, item);
      if (res.ok) {
        this.log.info("retry delivered", { sink: item.sink, attempt: item.attempt });
        report.delivered++;
        continue;
      }

      if (res.error.kind === "config" || item.attempt >= this.opts.maxAttempts) {
        this.log.warn("retry dropped", { sink: item.sink, attempt: item.attempt, error: describeError(res.error) });
        report.dropped++;
        continue;
      }

      await this.store.rpush(this.key, JSON.stringify({ ...item, attempt: item.attempt + 1, reason: describeError(res.error) }));
      report.requeued++;
    }
    return report;
  }

  async run(senders: RetrySenders, signal: AbortSignal): Promise<void> {
    this.log.info("retry loop started", { intervalMs: this.opts.intervalMs, maxAttempts: this.opts.maxAttempts });
    while (!signal.aborted) {
      try {
        const report = await this.drain(senders);
        if (report.delivered + report.requeued + report.dropped > 0) this.log.info("retry cycle", { ...report });
      } catch (err) {
        this.log.warn("retry drain failed", { error: errorMessage(err) });
      }
      await pause(this.opts.intervalMs, signal);
    }
    this.log.info("retry loop stopped");
  }

  private async send(senders: RetrySenders, item: RetryItem): Promise<Result<unknown>> {
    try {
      switch (item.sink) {
        case "analytics-order":
          return await senders["analytics-order"](item.payload);
        case "analytics-event":
          return await senders["analytics-event"](item.payload);
        case "delivery":
          return await senders.delivery(item.payload);
      }
    } catch (err) {
      const error: PortError = { kind: "transient", message: errorMessage(err) };
      return { ok: false, error };
    }
  }
}

function parseItem(raw: string): RetryItem | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = RetryItemSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
