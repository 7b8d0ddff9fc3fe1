/**
 * Typed outcome of a call into an external collaborator (chat platform,
 * payment gateway, analytics sinks). Ports never throw for network problems;
 * callers decide whether to log, retry, or surface the failure.
 */

export type PortErrorKind =
  /** Timeout, connection reset, 5xx, 429: worth retrying. */
  | "transient"
  /** The remote side refused the request; retrying the same payload will not help. */
  | "rejected"
  /** The recipient cannot be reached any more (bot blocked, chat gone). */
  | "blocked"
  /** The driver is not configured for this deployment. */
  | "config";

export interface PortError {
  kind: PortErrorKind;
  message: string;
  status?: number;
}

export type Result<T, E = PortError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(kind: PortErrorKind, message: string, status?: number): { ok: false; error: PortError } {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } };
}

/** True when a failed delivery may succeed on a later attempt. */
export function isRetryable(error: PortError): boolean {
  return error.kind === "transient" || error.kind === "rejected";
}

export function describeError(error: PortError): string {
  return error.status === undefined ? `${error.kind}:${error.message}` : `${error.kind}:${error.status}:${error.message}`;
}
