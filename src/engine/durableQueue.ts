/**
 * Durable FIFO of raw inbound events with reserve/ack.
 *
 *   push     -> RPUSH queue
 *   reserve  -> BLMOVE queue processing:{worker} LEFT RIGHT (atomic hand-over)
 *   ack      -> LREM processing:{worker} 1 raw
 *   recover  -> LMOVE processing:{worker} queue RIGHT LEFT until empty
 *
 * Every process reserves into its own processing list, named by its worker
 * id. Replicas that share an owner tag therefore never touch each other's
 * reserved events.
 *
 * Liveness
 * - A worker stamps its id in the workers sorted set on boot and on every
 *   heartbeat. A worker whose stamp is older than `leaseSeconds` is dead:
 *   any live worker moves its processing list back to the queue and drops
 *   its stamp.
 * - A clean stop hands back whatever is still reserved and drops the stamp.
 *
 * Recovered events go back to the head of the queue in their original order.
 */

import { Logger, createLogger, errorMessage } from "../infra/logger";
import type { KeyValueStore } from "../ports/KeyValueStore";
import type { StoreKeys } from "../store/keys";
import { pause } from "./pause";

export interface DurableQueueOptions {
  workerId: string;
  leaseSeconds: number;
  now?: () => number;
  logger?: Logger;
}

const RECLAIM_BATCH = 100;

export class DurableQueue {
  private readonly processingKey: string;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: Pick<StoreKeys, "queue" | "processing" | "workers">,
    private readonly opts: DurableQueueOptions
  ) {
    this.processingKey = keys.processing(opts.workerId);
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? createLogger("queue");
  }

  get workerId(): string {
    return this.opts.workerId;
  }

  push(raw: string): Promise<number> {
    return this.store.rpush(this.keys.queue, raw);
  }

  reserve(timeoutSeconds: number): Promise<string | null> {
    return this.store.blmove(this.keys.queue, this.processingKey, "LEFT", "RIGHT", timeoutSeconds);
  }

  async ack(raw: string): Promise<void> {
    await this.store.lrem(this.processingKey, 1, raw);
  }

  /** Boot-time recovery: this worker's own leftovers, then those of dead workers. */
  async recover(): Promise<number> {
    await this.heartbeat();
    const own = await this.restore(this.opts.workerId);
    return own + (await this.reclaimDead());
  }

  async heartbeat(): Promise<void> {
    await this.store.zadd(this.keys.workers, this.opts.workerId, this.seconds());
  }

  /** Moves the processing lists of workers whose lease ran out back to the queue. */
  async reclaimDead(): Promise<number> {
    const cutoff = this.seconds() - this.opts.leaseSeconds;
    const dead = await this.store.zrangeByScore(this.keys.workers, 0, cutoff, RECLAIM_BATCH);
    let moved = 0;
    for (const workerId of dead) {
      if (workerId === this.opts.workerId) continue;
      const n = await this.restore(workerId);
      await this.store.zrem(this.keys.workers, workerId);
      if (n > 0) this.log.warn("reclaimed events of dead worker", { workerId, events: n });
      moved += n;
    }
    return moved;
  }

  /** Heartbeat and reclaim until the signal aborts. */
  async keepAlive(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.heartbeat();
        await this.reclaimDead();
      } catch (err) {
        this.log.warn("heartbeat failed", { error: errorMessage(err) });
      }
      await pause(intervalMs, signal);
    }
  }

  /** Clean stop: hand back anything still reserved and drop the heartbeat. */
  async retire(): Promise<number> {
    const moved = await this.restore(this.opts.workerId);
    await this.store.zrem(this.keys.workers, this.opts.workerId);
    return moved;
  }

  depth(): Promise<number> {
    return this.store.llen(this.keys.queue);
  }

  reserved(): Promise<number> {
    return this.store.llen(this.processingKey);
  }

  private async restore(workerId: string): Promise<number> {
    const from = this.keys.processing(workerId);
    let moved = 0;
    while ((await this.store.lmove(from, this.keys.queue, "RIGHT", "LEFT")) !== null) {
      moved++;
    }
    return moved;
  }

  private seconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
