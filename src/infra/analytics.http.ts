/**
 * HTTP driver for AnalyticsPort.
 *
 * - Orders: POST {orderUrl} with header x-api-token.
 * - Events: POST {eventUrl} with a bearer token, body { data: [event] }.
 * - A sink left unconfigured answers `config`, which callers do not retry.
 * - Each order carries an Idempotency-Key derived from its content so a
 *   retried send is recognisable on the sink side.
 */

import { createHash } from "crypto";
import type { AnalyticsPort } from "../ports/AnalyticsPort";
import type { EventNotification, OrderNotification } from "../types/notifications";
import { Result, fail, ok } from "../types/result";
import { requestJson, statusKind, truncate } from "./http";

export interface HttpAnalyticsOptions {
  orderUrl: string;
  orderToken: string;
  eventUrl: string;
  eventToken: string;
  platform: string;
  timeoutMs: number;
}

export function createHttpAnalytics(opts: HttpAnalyticsOptions): AnalyticsPort {
  async function post(url: string, headers: Record<string, string>, body: unknown): Promise<Result<void>> {
    const res = await requestJson({
      url,
      method: "POST",
      headers: { "content-type": "application/json", "idempotency-key": idempotencyKey(body), ...headers },
      body: JSON.stringify(body),
      timeoutMs: opts.timeoutMs
    });
    if (!res.ok) return res;
    const { status, text } = res.value;
    if (status >= 400) return fail(statusKind(status), truncate(text, 500) || `HTTP ${status}`, status);
    return ok(undefined);
  }

  return {
    async sendOrder(order: OrderNotification) {
      if (!opts.orderUrl || !opts.orderToken) return fail("config", "order sink not configured");
      return post(opts.orderUrl, { "x-api-token": opts.orderToken }, toOrderBody(order, opts.platform));
    },

    async sendEvent(event: EventNotification) {
      if (!opts.eventUrl || !opts.eventToken) return fail("config", "event sink not configured");
      return post(opts.eventUrl, { authorization: `Bearer ${opts.eventToken}` }, { data: [toEventBody(event)] });
    }
  };
}

function toOrderBody(order: OrderNotification, platform: string): Record<string, unknown> {
  return {
    orderId: order.orderId,
    platform,
    paymentMethod: "credit_card",
    status: order.status,
    createdAt: order.createdAt,
    approvedDate: order.approvedAt,
    refundedAt: null,
    customer: { externalId: order.subjectId },
    products: [
      { id: order.orderId, name: order.planName, quantity: 1, priceInCents: order.amountInCents }
    ],
    trackingParameters: order.tracking,
    commission: {
      totalPriceInCents: order.amountInCents,
      gatewayFeeInCents: 0,
      userCommissionInCents: order.amountInCents,
      currency: order.currency
    },
    isTest: false
  };
}

function toEventBody(event: EventNotification): Record<string, unknown> {
  return {
    event_name: event.eventName,
    event_time: event.eventTime,
    event_id: event.eventId,
    action_source: "chat",
    user_data: { external_id: sha256(event.subjectId) },
    ...(event.value === null
      ? {}
      : { custom_data: { value: event.value, currency: event.currency, ...event.tracking } })
  };
}

function sha256(v: string): string {
  return createHash("sha256").update(v).digest("hex");
}

/** Stable digest over a JSON value (keys sorted). */
function idempotencyKey(v: unknown): string {
  return sha256(JSON.stringify(sortKeys(v)));
}

function sortKeys(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeys);
  if (v && typeof v === "object") {
    return Object.keys(v)
      .sort()
      .reduce<Record<string, unknown>>((acc, k) => {
        acc[k] = sortKeys(Reflect.get(v, k));
        return acc;
      }, {});
  }
  return v;
}
