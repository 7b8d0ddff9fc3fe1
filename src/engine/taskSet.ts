/**
 * Tracked background tasks.
 *
 * Every fire-and-forget action (dispatch tasks, delayed checkout nudges)
 * goes through a TaskSet so shutdown can drain running work and cancel
 * timers that have not fired yet. A task's error is logged here and never
 * reaches the spawner.
 */

import { Logger, createLogger, errorMessage } from "../infra/logger";
import { pause } from "./pause";

export class TaskSet {
  private readonly running = new Set<Promise<void>>();
  private readonly delayed = new Set<AbortController>();
  private closed = false;

  constructor(private readonly log: Logger = createLogger("tasks")) {}

  get size(): number {
    return this.running.size;
  }

  get pendingDelayed(): number {
    return this.delayed.size;
  }

  spawn(name: string, fn: () => Promise<void>): void {
    const task: Promise<void> = Promise.resolve()
      .then(fn)
      .catch((err: unknown) => {
        this.log.error("task failed", { task: name, error: errorMessage(err) });
      })
      .finally(() => {
        this.running.delete(task);
      });
    this.running.add(task);
  }

  /**
   * Run `fn` after `delayMs` unless cancelled first. Returns false when the
   * set no longer accepts work.
   */
  spawnDelayed(name: string, delayMs: number, fn: () => Promise<void>): boolean {
    if (this.closed) return false;
    const ctrl = new AbortController();
    this.delayed.add(ctrl);
    this.spawn(name, async () => {
      try {
        const elapsed = await pause(delayMs, ctrl.signal);
        if (!elapsed) {
          this.log.debug("delayed task cancelled", { task: name });
          return;
        }
      } finally {
        this.delayed.delete(ctrl);
      }
      await fn();
    });
    return true;
  }

  /** Abort every delayed task that has not started yet. */
  cancelAll(): void {
    this.closed = true;
    for (const ctrl of this.delayed) ctrl.abort();
  }

  /** Resolve once every running task has settled, including ones spawned while draining. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }
}
