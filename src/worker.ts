/**
 * Worker entry point.
 *
 * Loops (all share one AbortController)
 * - dispatch:  durable queue -> event handlers, bounded by WORKER_MAX_CONCURRENCY
 * - followup:  due-time index -> one follow-up per cycle
 * - payments:  pending set -> gateway lookups -> reconciler
 * - retry:     retry queue -> analytics sinks and access delivery
 * - heartbeat: worker lease refresh; reclaims events of workers whose lease ran out
 *
 * Boot
 * - Events this worker id reserved before a crash, and those of dead workers,
 *   are moved back to the queue.
 * - The chat webhook is registered when CHAT_WEBHOOK_URL is set.
 *
 * Shutdown on SIGINT/SIGTERM: abort every loop, let in-flight handlers
 * finish, hand back anything still reserved, cancel pending checkout
 * reminders, close the store.
 */

import { type AppConfig, loadConfig } from "./config";
import { DispatchLoop } from "./engine/dispatchLoop";
import { createLogger, errorMessage } from "./infra/logger";
import { createEventHandler } from "./processors/router";
import { type Runtime, buildRuntime } from "./runtime";
import { createFollowupAction } from "./scheduler/followupAction";
import { describeError } from "./types/result";

const log = createLogger("worker");

export interface Worker {
  dispatch: DispatchLoop;
  /** Resolves once every loop has returned. */
  done: Promise<void>;
  stop(): Promise<void>;
}

export async function startWorker(rt: Runtime): Promise<Worker> {
  const { config } = rt;
  const controller = new AbortController();
  const signal = controller.signal;

  const recovered = await rt.queue.recover();
  if (recovered > 0) log.warn("recovered unacked events", { recovered });

  if (config.chat.webhookUrl) {
    const res = await rt.chat.setWebhook(config.chat.webhookUrl, config.chat.webhookSecret, config.chat.dropPendingUpdates);
    if (res.ok) log.info("chat webhook registered", { url: config.chat.webhookUrl });
    else log.error("chat webhook registration failed", { error: describeError(res.error) });
  }

  const dispatch = new DispatchLoop({
    queue: rt.queue,
    handler: createEventHandler(rt.context),
    maxConcurrency: config.worker.maxConcurrency,
    popTimeoutSeconds: config.worker.popTimeoutSeconds
  });

  const done = Promise.all([
    dispatch.run(signal),
    rt.scheduler.run(createFollowupAction(rt.context), signal),
    rt.poller.run(signal),
    rt.retry.run(rt.retrySenders, signal),
    rt.queue.keepAlive(heartbeatMs(config), signal)
  ]).then(() => undefined);

  log.info("worker online", banner(config));

  return {
    dispatch,
    done,
    async stop() {
      controller.abort();
      await done;
      const returned = await rt.queue.retire();
      if (returned > 0) log.warn("returned reserved events on stop", { returned });
      rt.context.tasks.cancelAll();
      await rt.context.tasks.drain();
    }
  };
}

function heartbeatMs(config: AppConfig): number {
  return Math.max(1000, Math.floor((config.worker.leaseSeconds * 1000) / 3));
}

function banner(config: AppConfig): Record<string, unknown> {
  return {
    store: config.store.driver,
    instance: config.store.instanceTag,
    workerId: config.worker.id,
    chat: config.chat.driver,
    gateway: config.gateway.driver,
    maxConcurrency: config.worker.maxConcurrency
  };
}

async function main(): Promise<void> {
  const rt = buildRuntime(loadConfig());
  await rt.store.ping();
  const worker = await startWorker(rt);

  let stopping = false;
  const shutdown = async (sig: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info("shutdown requested", { signal: sig });
    try {
      await worker.stop();
      await rt.store.close();
      log.info("shutdown complete");
      process.exit(0);
    } catch (err) {
      log.error("shutdown error", { error: errorMessage(err) });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    log.error("worker failed to start", { error: errorMessage(err) });
    process.exit(1);
  });
}
