/**
 * Runtime configuration.
 *
 * Environment
 * - STORE_DRIVER               "redis" | "memory" (default redis)
 * - REDIS_URL                  redis connection string, required for the redis driver
 * - STORE_COMMAND_TIMEOUT_MS   bound on every non-blocking store command (default 5000)
 * - KEY_PREFIX                 namespace for every store key (default "ob:")
 * - QUEUE_KEY                  durable inbound queue name (default "updates")
 * - INSTANCE_TAG               owning-process tag written on subjects; records carrying
 *                              another tag are ignored by the follow-up scheduler
 * - WORKER_ID                  names this process's processing list; unique per running
 *                              process (default {INSTANCE_TAG}:{hostname}:{pid})
 * - WORKER_LEASE_SECONDS       heartbeat age after which a worker's reserved events are
 *                              handed back to the queue (default 60)
 * - SUBJECT_TTL_SECONDS        expiry of subject hashes (default 90 days)
 *
 * - CHAT_DRIVER                "telegram" | "noop" (default noop)
 * - CHAT_BOT_TOKEN, CHAT_API_BASEURL, CHAT_WEBHOOK_SECRET
 * - CHAT_WEBHOOK_URL           public URL of /chat/webhook, registered on worker boot
 * - CHAT_DROP_PENDING_UPDATES  boolean, passed along with the webhook registration
 * - CHAT_DEEPLINK_URL          bot link that GET /r redirects to with ?start=<token>
 *                              (e.g. https://t.me/<bot>); /r answers 503 when unset
 * - GATEWAY_DRIVER             "stripe" | "noop" (default noop)
 * - GATEWAY_SECRET_KEY, GATEWAY_API_BASEURL, GATEWAY_WEBHOOK_SECRET,
 *   GATEWAY_WEBHOOK_TOLERANCE_SECONDS, CHECKOUT_SUCCESS_URL, CHECKOUT_CANCEL_URL,
 *   CHECKOUT_REUSE_SECONDS
 * - ANALYTICS_DRIVER           "http" | "noop" (default noop)
 * - ANALYTICS_ORDER_URL, ANALYTICS_ORDER_TOKEN, ANALYTICS_EVENT_URL, ANALYTICS_EVENT_TOKEN,
 *   ANALYTICS_PLATFORM
 * - OUTBOUND_TIMEOUT_MS        bound on every outbound HTTP call (default 12000)
 *
 * - WORKER_MAX_CONCURRENCY     admission slots of the dispatch loop (default 100)
 * - WORKER_POP_TIMEOUT_SECONDS blocking pop timeout (default 1)
 * - FOLLOWUP_DELAY_SECONDS, FOLLOWUP_BATCH_SIZE, FOLLOWUP_IDLE_MS
 * - CHECKOUT_REMINDER_SECONDS  delay of the in-process checkout nudge (0 disables)
 * - PAYMENT_POLL_SAMPLE, PAYMENT_POLL_CONCURRENCY, PAYMENT_POLL_INTERVAL_SECONDS,
 *   PAYMENT_POLL_IDLE_SECONDS
 * - RETRY_MAX_ATTEMPTS, RETRY_BATCH_SIZE, RETRY_INTERVAL_SECONDS
 *
 * - PORTAL_BASE_URL            link sent with the access key
 * - ADMIN_TOKEN                protects /admin routes (routes answer 403 when unset)
 * - PORT                       HTTP port (default 3000)
 * - LOG_LEVEL                  read by the logger directly
 */

import { hostname } from "os";
import { z } from "zod";

/** Parse boolean-like env vars. Accepts: true, 1, yes, on (case-insensitive). */
const BoolEnv = z
  .string()
  .optional()
  .transform((raw) => {
    if (raw == null) return false;
    const v = raw.trim().toLowerCase();
    return v === "true" || v === "1" || v === "yes" || v === "on";
  });

const PositiveInt = z.coerce.number().int().positive();
const NonNegativeInt = z.coerce.number().int().nonnegative();

export const EnvSchema = z
  .object({
    STORE_DRIVER: z.enum(["redis", "memory"]).default("redis"),
    REDIS_URL: z.string().trim().default(""),
    STORE_COMMAND_TIMEOUT_MS: PositiveInt.default(5000),
    KEY_PREFIX: z.string().default("ob:"),
    QUEUE_KEY: z.string().min(1).default("updates"),
    INSTANCE_TAG: z.string().trim().min(1).default("default"),
    WORKER_ID: z.string().trim().default(""),
    WORKER_LEASE_SECONDS: PositiveInt.default(60),
    SUBJECT_TTL_SECONDS: PositiveInt.default(90 * 24 * 60 * 60),

    CHAT_DRIVER: z.enum(["telegram", "noop"]).default("noop"),
    CHAT_BOT_TOKEN: z.string().default(""),
    CHAT_API_BASEURL: z.string().url().default("https://api.telegram.org"),
    CHAT_WEBHOOK_SECRET: z.string().default(""),
    CHAT_WEBHOOK_URL: z.string().default(""),
    CHAT_DROP_PENDING_UPDATES: BoolEnv,
    CHAT_DEEPLINK_URL: z.union([z.literal(""), z.string().url()]).default(""),

    GATEWAY_DRIVER: z.enum(["stripe", "noop"]).default("noop"),
    GATEWAY_SECRET_KEY: z.string().default(""),
    GATEWAY_API_BASEURL: z.string().url().default("https://api.stripe.com/v1"),
    GATEWAY_WEBHOOK_SECRET: z.string().default(""),
    GATEWAY_WEBHOOK_TOLERANCE_SECONDS: NonNegativeInt.default(300),
    CHECKOUT_SUCCESS_URL: z.string().default(""),
    CHECKOUT_CANCEL_URL: z.string().default(""),
    CHECKOUT_REUSE_SECONDS: NonNegativeInt.default(1800),
    CHECKOUT_LOCALE: z.string().default("en"),

    ANALYTICS_DRIVER: z.enum(["http", "noop"]).default("noop"),
    ANALYTICS_ORDER_URL: z.string().default(""),
    ANALYTICS_ORDER_TOKEN: z.string().default(""),
    ANALYTICS_EVENT_URL: z.string().default(""),
    ANALYTICS_EVENT_TOKEN: z.string().default(""),
    ANALYTICS_PLATFORM: z.string().default("chat-bot"),
    OUTBOUND_TIMEOUT_MS: PositiveInt.default(12_000),

    WORKER_MAX_CONCURRENCY: PositiveInt.default(100),
    WORKER_POP_TIMEOUT_SECONDS: z.coerce.number().positive().default(1),
    FOLLOWUP_DELAY_SECONDS: NonNegativeInt.default(360),
    FOLLOWUP_BATCH_SIZE: PositiveInt.default(50),
    FOLLOWUP_IDLE_MS: PositiveInt.default(1000),
    CHECKOUT_REMINDER_SECONDS: NonNegativeInt.default(600),
    PAYMENT_POLL_SAMPLE: PositiveInt.default(50),
    PAYMENT_POLL_CONCURRENCY: PositiveInt.default(10),
    PAYMENT_POLL_INTERVAL_SECONDS: PositiveInt.default(20),
    PAYMENT_POLL_IDLE_SECONDS: PositiveInt.default(15),
    RETRY_MAX_ATTEMPTS: PositiveInt.default(3),
    RETRY_BATCH_SIZE: PositiveInt.default(10),
    RETRY_INTERVAL_SECONDS: PositiveInt.default(30),

    PORTAL_BASE_URL: z.string().default("http://localhost:3000/portal"),
    ADMIN_TOKEN: z.string().default(""),
    PORT: PositiveInt.default(3000)
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === "redis" && env.REDIS_URL === "") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["REDIS_URL"], message: "REDIS_URL is required for the redis store driver" });
    }
    if (env.CHAT_DRIVER === "telegram" && env.CHAT_BOT_TOKEN === "") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["CHAT_BOT_TOKEN"], message: "CHAT_BOT_TOKEN is required for the telegram chat driver" });
    }
    if (env.GATEWAY_DRIVER === "stripe" && env.GATEWAY_SECRET_KEY === "") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["GATEWAY_SECRET_KEY"], message: "GATEWAY_SECRET_KEY is required for the stripe gateway driver" });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  store: {
    driver: Env["STORE_DRIVER"];
    redisUrl: string;
    commandTimeoutMs: number;
    keyPrefix: string;
    queueName: string;
    instanceTag: string;
    subjectTtlSeconds: number;
  };
  chat: {
    driver: Env["CHAT_DRIVER"];
    botToken: string;
    apiBaseUrl: string;
    webhookSecret: string;
    /** Public URL of POST /chat/webhook; registered with the platform on worker boot when set. */
    webhookUrl: string;
    dropPendingUpdates: boolean;
    deepLinkUrl: string;
  };
  gateway: {
    driver: Env["GATEWAY_DRIVER"];
    secretKey: string;
    apiBaseUrl: string;
    webhookSecret: string;
    webhookToleranceSeconds: number;
    successUrl: string;
    cancelUrl: string;
    reuseWindowSeconds: number;
    locale: string;
  };
  analytics: {
    driver: Env["ANALYTICS_DRIVER"];
    orderUrl: string;
    orderToken: string;
    eventUrl: string;
    eventToken: string;
    platform: string;
  };
  outboundTimeoutMs: number;
  worker: {
    /** Distinct per process, unlike `store.instanceTag` which replicas may share. */
    id: string;
    leaseSeconds: number;
    maxConcurrency: number;
    popTimeoutSeconds: number;
  };
  followup: { delaySeconds: number; batchSize: number; idleMs: number; checkoutReminderSeconds: number };
  payments: { pollSample: number; pollConcurrency: number; pollIntervalMs: number; pollIdleMs: number };
  retry: { maxAttempts: number; batchSize: number; intervalMs: number };
  portalBaseUrl: string;
  adminToken: string;
  port: number;
}

/**
 * Parse and validate the environment once. Throws a single error listing
 * every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  const env = parsed.data;
  return {
    store: {
      driver: env.STORE_DRIVER,
      redisUrl: env.REDIS_URL,
      commandTimeoutMs: env.STORE_COMMAND_TIMEOUT_MS,
      keyPrefix: env.KEY_PREFIX,
      queueName: env.QUEUE_KEY,
      instanceTag: env.INSTANCE_TAG,
      subjectTtlSeconds: env.SUBJECT_TTL_SECONDS
    },
    chat: {
      driver: env.CHAT_DRIVER,
      botToken: env.CHAT_BOT_TOKEN,
      apiBaseUrl: env.CHAT_API_BASEURL,
      webhookSecret: env.CHAT_WEBHOOK_SECRET,
      webhookUrl: env.CHAT_WEBHOOK_URL,
      dropPendingUpdates: env.CHAT_DROP_PENDING_UPDATES,
      deepLinkUrl: env.CHAT_DEEPLINK_URL
    },
    gateway: {
      driver: env.GATEWAY_DRIVER,
      secretKey: env.GATEWAY_SECRET_KEY,
      apiBaseUrl: env.GATEWAY_API_BASEURL,
      webhookSecret: env.GATEWAY_WEBHOOK_SECRET,
      webhookToleranceSeconds: env.GATEWAY_WEBHOOK_TOLERANCE_SECONDS,
      successUrl: env.CHECKOUT_SUCCESS_URL,
      cancelUrl: env.CHECKOUT_CANCEL_URL,
      reuseWindowSeconds: env.CHECKOUT_REUSE_SECONDS,
      locale: env.CHECKOUT_LOCALE
    },
    analytics: {
      driver: env.ANALYTICS_DRIVER,
      orderUrl: env.ANALYTICS_ORDER_URL,
      orderToken: env.ANALYTICS_ORDER_TOKEN,
      eventUrl: env.ANALYTICS_EVENT_URL,
      eventToken: env.ANALYTICS_EVENT_TOKEN,
      platform: env.ANALYTICS_PLATFORM
    },
    outboundTimeoutMs: env.OUTBOUND_TIMEOUT_MS,
    worker: {
      id: env.WORKER_ID || `${env.INSTANCE_TAG}:${hostname()}:${process.pid}`,
      leaseSeconds: env.WORKER_LEASE_SECONDS,
      maxConcurrency: env.WORKER_MAX_CONCURRENCY,
      popTimeoutSeconds: env.WORKER_POP_TIMEOUT_SECONDS
    },
    followup: {
      delaySeconds: env.FOLLOWUP_DELAY_SECONDS,
      batchSize: env.FOLLOWUP_BATCH_SIZE,
      idleMs: env.FOLLOWUP_IDLE_MS,
      checkoutReminderSeconds: env.CHECKOUT_REMINDER_SECONDS
    },
    payments: {
      pollSample: env.PAYMENT_POLL_SAMPLE,
      pollConcurrency: env.PAYMENT_POLL_CONCURRENCY,
      pollIntervalMs: env.PAYMENT_POLL_INTERVAL_SECONDS * 1000,
      pollIdleMs: env.PAYMENT_POLL_IDLE_SECONDS * 1000
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      batchSize: env.RETRY_BATCH_SIZE,
      intervalMs: env.RETRY_INTERVAL_SECONDS * 1000
    },
    portalBaseUrl: env.PORTAL_BASE_URL,
    adminToken: env.ADMIN_TOKEN,
    port: env.PORT
  };
}
