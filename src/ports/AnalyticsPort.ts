/**
 * AnalyticsPort
 *
 * Two logical sinks: an order sink (one record per checkout and per
 * confirmed payment) and an event sink (conversion events). Both may be down
 * for minutes at a time; callers route failures into the retry queue.
 *
 * Drivers
 * - "noop" (default): logs and records payloads in memory.
 * - "http": JSON POST to configured endpoints (infra/analytics.http.ts).
 */

import type { AppConfig } from "../config";
import { createHttpAnalytics } from "../infra/analytics.http";
import { createLogger } from "../infra/logger";
import type { EventNotification, OrderNotification } from "../types/notifications";
import { Result, ok } from "../types/result";

export interface AnalyticsPort {
  sendOrder(order: OrderNotification): Promise<Result<void>>;
  sendEvent(event: EventNotification): Promise<Result<void>>;
}

export function getAnalyticsPort(config: AppConfig): AnalyticsPort {
  if (config.analytics.driver === "http") {
    return createHttpAnalytics({
      orderUrl: config.analytics.orderUrl,
      orderToken: config.analytics.orderToken,
      eventUrl: config.analytics.eventUrl,
      eventToken: config.analytics.eventToken,
      platform: config.analytics.platform,
      timeoutMs: config.outboundTimeoutMs
    });
  }
  return createNoopAnalytics();
}

const log = createLogger("analytics.noop");

export function createNoopAnalytics(): AnalyticsPort & { orders: OrderNotification[]; events: EventNotification[] } {
  const orders: OrderNotification[] = [];
  const events: EventNotification[] = [];
  return {
    orders,
    events,
    async sendOrder(order) {
      orders.push(order);
      log.info("sendOrder(noop)", { orderId: order.orderId, status: order.status });
      return ok(undefined);
    },
    async sendEvent(event) {
      events.push(event);
      log.info("sendEvent(noop)", { eventName: event.eventName, eventId: event.eventId });
      return ok(undefined);
    }
  };
}
