/**
 * Payloads sent to the analytics sinks. Both travel through the retry queue
 * as JSON, so they are validated again when an item is drained.
 */

import { z } from "zod";

export const TrackingSchema = z.record(z.string(), z.string());
export type Tracking = z.infer<typeof TrackingSchema>;

export const OrderNotificationSchema = z.object({
  orderId: z.string().min(1),
  subjectId: z.string().min(1),
  status: z.enum(["waiting_payment", "paid", "refused"]),
  amountInCents: z.number().int().nonnegative(),
  currency: z.string().length(3),
  planName: z.string(),
  createdAt: z.string(),
  approvedAt: z.string().nullable(),
  tracking: TrackingSchema
});
export type OrderNotification = z.infer<typeof OrderNotificationSchema>;

export const EventNotificationSchema = z.object({
  eventName: z.string().min(1),
  /** Dedup key on the sink side. */
  eventId: z.string().min(1),
  subjectId: z.string().min(1),
  eventTime: z.number().int().positive(),
  value: z.number().nonnegative().nullable(),
  currency: z.string().length(3),
  tracking: TrackingSchema
});
export type EventNotification = z.infer<typeof EventNotificationSchema>;
