/**
 * Outbound HTTP helper shared by the port drivers.
 *
 * - Global fetch with an AbortController deadline on every call.
 * - Never throws: network failures and timeouts come back as transient
 *   errors, and the HTTP status is left for the driver to classify.
 */

import { Result, fail, ok } from "../types/result";

export interface HttpRequest {
  url: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpReply {
  status: number;
  /** Parsed JSON body, or null when the body is empty or not JSON. */
  body: unknown;
  text: string;
}

export async function requestJson(req: HttpRequest): Promise<Result<HttpReply>> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), req.timeoutMs);
  try {
    const res = await fetch(req.url, {
      method: req.method ?? "GET",
      headers: req.headers,
      body: req.body,
      signal: ctrl.signal
    });
    const text = await res.text();
    return ok({ status: res.status, body: parseJson(text), text });
  } catch (err) {
    const reason = ctrl.signal.aborted ? `timeout after ${req.timeoutMs}ms` : err instanceof Error ? err.message : String(err);
    return fail("transient", reason);
  } finally {
    clearTimeout(t);
  }
}

function parseJson(text: string): unknown {
  if (text === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function truncate(s: string, n: number): string {
  if (s.length <= n) return s;
  return s.slice(0, n) + "…";
}

/** Classify a non-2xx reply by status. */
export function statusKind(status: number): "transient" | "rejected" {
  return status === 429 || status >= 500 ? "transient" : "rejected";
}
