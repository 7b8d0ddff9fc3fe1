/**
 * Structured logger shared by the worker and the HTTP service.
 *
 * - One JSON line per entry: { level, msg, ts, scope?, ...meta }.
 * - LOG_LEVEL (debug, info, warn, error) is read on every call so tests and
 *   operators can change verbosity without rebuilding loggers.
 * - The last RING_SIZE lines are kept in memory for the admin log dump.
 * - Meta keys that look like credentials are redacted before printing.
 */

export type Level = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Derive a logger whose entries carry `scope`. */
  child(scope: string): Logger;
}

const ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const RING_SIZE = 400;
const SENSITIVE = /token|secret|password|accesskey|signature/i;

const ring: string[] = [];

function isLevel(v: string | undefined): v is Level {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

function threshold(): Level {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLevel(raw) ? raw : "info";
}

function redact(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE.test(k) && v !== undefined && v !== "" ? "<redacted>" : v;
  }
  return out;
}

function emit(level: Level, scope: string | undefined, msg: string, meta: LogMeta): void {
  if (ORDER[level] < ORDER[threshold()]) return;
  const entry = { level, msg, ts: new Date().toISOString(), ...(scope ? { scope } : {}), ...redact(meta) };
  const line = JSON.stringify(entry);
  ring.push(line);
  if (ring.length > RING_SIZE) ring.splice(0, ring.length - RING_SIZE);
  // eslint-disable-next-line no-console
  console.log(line);
}

export function createLogger(scope?: string): Logger {
  return {
    debug: (msg, meta = {}) => emit("debug", scope, msg, meta),
    info: (msg, meta = {}) => emit("info", scope, msg, meta),
    warn: (msg, meta = {}) => emit("warn", scope, msg, meta),
    error: (msg, meta = {}) => emit("error", scope, msg, meta),
    child: (sub) => createLogger(scope ? `${scope}.${sub}` : sub)
  };
}

export const log = createLogger();

/** Most recent log lines, oldest first. */
export function recentLogLines(limit?: number): string[] {
  if (limit === undefined || limit >= ring.length) return [...ring];
  return ring.slice(ring.length - limit);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
