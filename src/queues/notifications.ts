/**
 * Sends analytics notifications right away and parks failures in the retry
 * queue. `config` failures (sink not configured) are logged once per call
 * and not retried.
 */

import { createLogger, errorMessage } from "../infra/logger";
import type { AnalyticsPort } from "../ports/AnalyticsPort";
import type { EventNotification, OrderNotification } from "../types/notifications";
import { Result, describeError, isRetryable } from "../types/result";
import type { RetryEntry, RetryQueue } from "./retryQueue";

const log = createLogger("notify");

export class NotificationDispatcher {
  constructor(
    private readonly analytics: AnalyticsPort,
    private readonly retry: RetryQueue
  ) {}

  order(order: OrderNotification): Promise<void> {
    return this.dispatch({ sink: "analytics-order", payload: order }, () => this.analytics.sendOrder(order));
  }

  event(event: EventNotification): Promise<void> {
    return this.dispatch({ sink: "analytics-event", payload: event }, () => this.analytics.sendEvent(event));
  }

  private async dispatch(entry: RetryEntry, send: () => Promise<Result<void>>): Promise<void> {
    const res = await send();
    if (res.ok) return;
    if (!isRetryable(res.error)) {
      log.debug("notification skipped", { sink: entry.sink, error: describeError(res.error) });
      return;
    }
    try {
      await this.retry.enqueue(entry, describeError(res.error));
    } catch (err) {
      log.warn("retry enqueue failed, notification lost", { sink: entry.sink, error: errorMessage(err) });
    }
  }
}
