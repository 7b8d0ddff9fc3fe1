/**
 * Gateway status vocabulary.
 *
 * Raw statuses from any gateway (webhook events, session lookups, manual
 * checks) normalize into OK, PENDING or one terminal failure kind. Matching
 * is case-insensitive after trimming; the empty string counts as PENDING.
 * Anything outside the table is terminal (UNRECOGNIZED): polling a status
 * nobody understands forever is worse than stopping.
 */

export type FailureKind = "FAILED" | "CANCELED" | "EXPIRED" | "REFUNDED" | "CHARGEBACK" | "ERROR" | "UNRECOGNIZED";

export type NormalizedStatus = { kind: "OK" } | { kind: "PENDING" } | { kind: "FAILED"; reason: FailureKind };

const TABLE: Record<string, NormalizedStatus> = {
  OK: { kind: "OK" },
  PAID: { kind: "OK" },
  COMPLETE: { kind: "OK" },
  COMPLETED: { kind: "OK" },
  TRANSACTION_PAID: { kind: "OK" },
  APPROVED: { kind: "OK" },
  NO_PAYMENT_REQUIRED: { kind: "OK" },

  "": { kind: "PENDING" },
  PENDING: { kind: "PENDING" },
  UNPAID: { kind: "PENDING" },
  OPEN: { kind: "PENDING" },
  CREATED: { kind: "PENDING" },
  PROCESSING: { kind: "PENDING" },
  WAITING_PAYMENT: { kind: "PENDING" },
  TRANSACTION_CREATED: { kind: "PENDING" },

  FAILED: { kind: "FAILED", reason: "FAILED" },
  REFUSED: { kind: "FAILED", reason: "FAILED" },
  CANCELED: { kind: "FAILED", reason: "CANCELED" },
  CANCELLED: { kind: "FAILED", reason: "CANCELED" },
  EXPIRED: { kind: "FAILED", reason: "EXPIRED" },
  REFUNDED: { kind: "FAILED", reason: "REFUNDED" },
  CHARGEBACK: { kind: "FAILED", reason: "CHARGEBACK" },
  ERROR: { kind: "FAILED", reason: "ERROR" },
  UNRECOGNIZED: { kind: "FAILED", reason: "UNRECOGNIZED" }
};

export function normalizeStatus(raw: string | null | undefined): NormalizedStatus {
  const key = (raw ?? "").trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(TABLE, key) ? TABLE[key] : { kind: "FAILED", reason: "UNRECOGNIZED" };
}

/** The value stored in the payment record's `status` field. */
export function statusLabel(status: NormalizedStatus): string {
  return status.kind === "FAILED" ? status.reason : status.kind;
}
