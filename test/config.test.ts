/**
 * Configuration tests
 *
 * Goals
 * - Defaults apply when the environment is silent.
 * - Driver-specific credentials are required only for that driver.
 * - The shipped offer catalogue validates.
 */

import { hostname } from "os";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";
import { loadOffers } from "../src/services/offers";

describe("loadConfig", () => {
  it("applies defaults for the memory driver", () => {
    const cfg = loadConfig({ STORE_DRIVER: "memory" });
    expect(cfg.store).toMatchObject({ driver: "memory", keyPrefix: "ob:", queueName: "updates", instanceTag: "default" });
    expect(cfg.worker).toEqual({
      id: `default:${hostname()}:${process.pid}`,
      leaseSeconds: 60,
      maxConcurrency: 100,
      popTimeoutSeconds: 1
    });
    expect(cfg.payments.pollIntervalMs).toBe(20_000);
    expect(cfg.gateway.reuseWindowSeconds).toBe(1800);
    expect(cfg.chat.dropPendingUpdates).toBe(false);
  });

  it("keeps the worker id apart from the shared instance tag", () => {
    const cfg = loadConfig({ STORE_DRIVER: "memory", INSTANCE_TAG: "replica", WORKER_ID: "pod-7" });
    expect(cfg.store.instanceTag).toBe("replica");
    expect(cfg.worker.id).toBe("pod-7");
  });

  it("requires REDIS_URL for the redis driver", () => {
    expect(() => loadConfig({})).toThrow("Invalid configuration: REDIS_URL: REDIS_URL is required for the redis store driver");
  });

  it("requires credentials only for the drivers that use them", () => {
    expect(() => loadConfig({ STORE_DRIVER: "memory", CHAT_DRIVER: "telegram" })).toThrow("CHAT_BOT_TOKEN is required");
    expect(() => loadConfig({ STORE_DRIVER: "memory", GATEWAY_DRIVER: "stripe" })).toThrow("GATEWAY_SECRET_KEY is required");
  });

  it("coerces numbers and booleans", () => {
    const cfg = loadConfig({ STORE_DRIVER: "memory", WORKER_MAX_CONCURRENCY: "7", CHAT_DROP_PENDING_UPDATES: "Yes" });
    expect(cfg.worker.maxConcurrency).toBe(7);
    expect(cfg.chat.dropPendingUpdates).toBe(true);
  });

  it("rejects non-positive concurrency", () => {
    expect(() => loadConfig({ STORE_DRIVER: "memory", WORKER_MAX_CONCURRENCY: "0" })).toThrow(/^Invalid configuration: WORKER_MAX_CONCURRENCY/);
  });
});

describe("loadOffers", () => {
  it("reads the shipped catalogue", () => {
    const offers = loadOffers();
    expect(offers.currency).toBe("GBP");
    expect(offers.plans.map((p) => p.id)).toEqual(["week", "fortnight", "lifetime"]);
  });
});
