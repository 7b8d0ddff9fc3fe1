/**
 * Composition root. Builds every component from AppConfig once; the worker
 * and the HTTP service both take what they need from the result.
 *
 * Tests pass `overrides` to swap the store, the ports and the clock.
 */

import type { AppConfig } from "./config";
import { AccessDelivery } from "./delivery/accessDelivery";
import { DurableQueue } from "./engine/durableQueue";
import { TaskSet } from "./engine/taskSet";
import { createLogger } from "./infra/logger";
import { MemoryStore } from "./infra/memory.store";
import { RedisStore } from "./infra/redis.store";
import { PaymentLedger } from "./payments/paymentLedger";
import { PaymentPoller } from "./payments/paymentPoller";
import { PaymentReconciler } from "./payments/reconciler";
import { type AnalyticsPort, getAnalyticsPort } from "./ports/AnalyticsPort";
import { type ChatPort, getChatPort } from "./ports/ChatPort";
import { type GatewayPort, getGatewayPort } from "./ports/GatewayPort";
import type { KeyValueStore } from "./ports/KeyValueStore";
import type { HandlerContext } from "./processors/context";
import { NotificationDispatcher } from "./queues/notifications";
import { RetryQueue, type RetrySenders } from "./queues/retryQueue";
import { FollowupScheduler } from "./scheduler/followupScheduler";
import { CheckoutService } from "./services/checkout";
import { FunnelMetrics } from "./services/funnelMetrics";
import { DEFAULT_OFFERS_PATH, type Offers, loadOffers } from "./services/offers";
import { SubjectRepository } from "./services/subjects";
import { CampaignTokens } from "./services/tracking";
import { type StoreKeys, createKeys } from "./store/keys";

export interface RuntimeOverrides {
  store?: KeyValueStore;
  chat?: ChatPort;
  gateway?: GatewayPort;
  analytics?: AnalyticsPort;
  offers?: Offers;
  now?: () => number;
}

export interface Runtime {
  config: AppConfig;
  store: KeyValueStore;
  keys: StoreKeys;
  queue: DurableQueue;
  chat: ChatPort;
  gateway: GatewayPort;
  subjects: SubjectRepository;
  scheduler: FollowupScheduler;
  ledger: PaymentLedger;
  reconciler: PaymentReconciler;
  poller: PaymentPoller;
  delivery: AccessDelivery;
  retry: RetryQueue;
  retrySenders: RetrySenders;
  funnel: FunnelMetrics;
  campaigns: CampaignTokens;
  context: HandlerContext;
}

function createStore(config: AppConfig, now: () => number): KeyValueStore {
  if (config.store.driver === "memory") return new MemoryStore(now);
  return new RedisStore({ url: config.store.redisUrl, commandTimeoutMs: config.store.commandTimeoutMs });
}

export function buildRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const now = overrides.now ?? Date.now;
  const store = overrides.store ?? createStore(config, now);
  const keys = createKeys(config.store.keyPrefix, config.store.queueName);
  const chat = overrides.chat ?? getChatPort(config);
  const gateway = overrides.gateway ?? getGatewayPort(config);
  const analytics = overrides.analytics ?? getAnalyticsPort(config);
  const offers = overrides.offers ?? loadOffers(DEFAULT_OFFERS_PATH);

  const queue = new DurableQueue(store, keys, {
    workerId: config.worker.id,
    leaseSeconds: config.worker.leaseSeconds,
    now
  });
  const subjects = new SubjectRepository(store, keys, {
    ttlSeconds: config.store.subjectTtlSeconds,
    instanceTag: config.store.instanceTag,
    now
  });
  const scheduler = new FollowupScheduler(store, keys, {
    batchSize: config.followup.batchSize,
    idleMs: config.followup.idleMs,
    now
  });
  const ledger = new PaymentLedger(store, keys, now);
  const funnel = new FunnelMetrics(store, keys, now);
  const campaigns = new CampaignTokens(store, keys);
  const retry = new RetryQueue(store, keys.retry, {
    maxAttempts: config.retry.maxAttempts,
    batchSize: config.retry.batchSize,
    intervalMs: config.retry.intervalMs,
    now
  });
  const notifications = new NotificationDispatcher(analytics, retry);
  const delivery = new AccessDelivery(store, keys, subjects, chat, { portalBaseUrl: config.portalBaseUrl, now });
  const checkout = new CheckoutService(ledger, gateway, notifications, {
    currency: offers.currency,
    reuseWindowSeconds: config.gateway.reuseWindowSeconds,
    now
  });
  const reconciler = new PaymentReconciler({ ledger, subjects, scheduler, delivery, retry, notifications, funnel, now });
  const poller = new PaymentPoller(ledger, gateway, reconciler, {
    sample: config.payments.pollSample,
    concurrency: config.payments.pollConcurrency,
    intervalMs: config.payments.pollIntervalMs,
    idleMs: config.payments.pollIdleMs
  });

  const retrySenders: RetrySenders = {
    "analytics-order": (payload) => analytics.sendOrder(payload),
    "analytics-event": (payload) => analytics.sendEvent(payload),
    delivery: (payload) => delivery.deliverIfNeeded(payload.subjectId)
  };

  const context: HandlerContext = {
    subjects,
    scheduler,
    ledger,
    checkout,
    poller,
    delivery,
    chat,
    funnel,
    campaigns,
    offers,
    tasks: new TaskSet(createLogger("tasks")),
    settings: {
      followupDelaySeconds: config.followup.delaySeconds,
      checkoutReminderSeconds: config.followup.checkoutReminderSeconds
    },
    log: createLogger("handler")
  };

  return {
    config,
    store,
    keys,
    queue,
    chat,
    gateway,
    subjects,
    scheduler,
    ledger,
    reconciler,
    poller,
    delivery,
    retry,
    retrySenders,
    funnel,
    campaigns,
    context
  };
}
