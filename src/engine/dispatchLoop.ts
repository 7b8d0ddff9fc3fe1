/**
 * Dispatch loop: durable queue -> bounded set of handler tasks.
 *
 * Contract
 * - One admission slot is acquired before each reserve and handed to the
 *   spawned task; an empty reserve gives it back. While every slot is taken
 *   the loop waits and reserves nothing, so reserved-but-unfinished events
 *   never exceed maxConcurrency.
 * - A task always acks its event and releases its slot, whether the handler
 *   resolved or threw.
 * - Reserve order is FIFO; completion order is whatever the handlers make it.
 * - Store failures while reserving are logged and backed off. Nothing
 *   escapes `run`; it returns after the signal aborts and in-flight tasks
 *   have drained.
 */

import { Logger, createLogger, errorMessage } from "../infra/logger";
import { DurableQueue } from "./durableQueue";
import { pause } from "./pause";
import { Semaphore } from "./semaphore";
import { TaskSet } from "./taskSet";

export type EventHandler = (raw: string) => Promise<void>;

export interface DispatchLoopOptions {
  queue: DurableQueue;
  handler: EventHandler;
  maxConcurrency: number;
  popTimeoutSeconds: number;
  /** Housekeeping run on every empty reserve. */
  onIdle?: () => Promise<void>;
  errorBackoffMs?: number;
  logger?: Logger;
}

export class DispatchLoop {
  private readonly slots: Semaphore;
  private readonly tasks: TaskSet;
  private readonly log: Logger;
  private active = 0;
  private peak = 0;
  private processed = 0;

  constructor(private readonly opts: DispatchLoopOptions) {
    this.slots = new Semaphore(opts.maxConcurrency);
    this.log = opts.logger ?? createLogger("dispatch");
    this.tasks = new TaskSet(this.log);
  }

  get inFlight(): number {
    return this.active;
  }

  /** Highest number of handlers observed running at once. */
  get peakInFlight(): number {
    return this.peak;
  }

  get processedCount(): number {
    return this.processed;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.log.info("dispatch loop started", {
      maxConcurrency: this.opts.maxConcurrency,
      popTimeoutSeconds: this.opts.popTimeoutSeconds
    });
    while (!signal.aborted) {
      const release = await this.slots.acquire();
      if (signal.aborted) {
        release();
        break;
      }
      const raw = await this.reserve(signal);
      if (raw === null) {
        release();
        if (!signal.aborted) await this.idle();
        continue;
      }
      this.tasks.spawn("dispatch", () => this.process(raw, release));
    }
    this.log.info("dispatch loop stopping", { inFlight: this.active });
    await this.tasks.drain();
    this.log.info("dispatch loop stopped", { processed: this.processed });
  }

  private async reserve(signal: AbortSignal): Promise<string | null> {
    try {
      return await this.opts.queue.reserve(this.opts.popTimeoutSeconds);
    } catch (err) {
      this.log.warn("reserve failed", { error: errorMessage(err) });
      await pause(this.opts.errorBackoffMs ?? 1000, signal);
      return null;
    }
  }

  private async idle(): Promise<void> {
    if (!this.opts.onIdle) return;
    try {
      await this.opts.onIdle();
    } catch (err) {
      this.log.warn("idle hook failed", { error: errorMessage(err) });
    }
  }

  private async process(raw: string, release: () => void): Promise<void> {
    const started = Date.now();
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    try {
      await this.opts.handler(raw);
      this.log.debug("event processed", { ms: Date.now() - started });
    } catch (err) {
      this.log.error("handler threw", { ms: Date.now() - started, error: errorMessage(err) });
    } finally {
      this.active -= 1;
      this.processed += 1;
      try {
        await this.opts.queue.ack(raw);
      } catch (err) {
        this.log.warn("ack failed; event will be redelivered after restart", { error: errorMessage(err) });
      } finally {
        release();
      }
    }
  }
}
