/**
 * Campaign parameters carried in the /start payload.
 *
 * Accepted forms: a query string (`utm_source=x&utm_campaign=y`), the same
 * query string base64url-encoded (chat platforms restrict payload
 * characters), or an opaque token kept as `payload`.
 *
 * Chat platforms also cap the payload length, so ad links go through
 * `GET /r`, which stores the full parameter set under a short token
 * ({p}campaign:{token}, hash, 7-day TTL) and starts the chat with that token.
 */

import { randomBytes } from "crypto";
import type { KeyValueStore } from "../ports/KeyValueStore";
import type { StoreKeys } from "../store/keys";
import type { Tracking } from "../types/notifications";

const CAMPAIGN_KEYS = ["src", "sck", "utm_source", "utm_medium", "utm_campaign", "utm_content", "utm_term", "fbclid", "fbp"];
const KEYS = new Set([...CAMPAIGN_KEYS, "payload"]);
const MAX_VALUE = 200;

export const CAMPAIGN_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;

function fromQuery(qs: string): Tracking {
  const out: Tracking = {};
  for (const [k, v] of new URLSearchParams(qs)) {
    if (KEYS.has(k) && v !== "") out[k] = v.slice(0, MAX_VALUE);
  }
  return out;
}

export function parseStartPayload(payload: string): Tracking {
  const raw = payload.trim();
  if (raw === "") return {};
  if (raw.includes("=")) {
    const direct = fromQuery(raw);
    if (Object.keys(direct).length > 0) return direct;
  }
  const decoded = Buffer.from(raw, "base64url").toString("utf8");
  if (decoded.includes("=")) {
    const viaBase64 = fromQuery(decoded);
    if (Object.keys(viaBase64).length > 0) return viaBase64;
  }
  return { payload: raw.slice(0, MAX_VALUE) };
}

/** Known campaign keys with a non-empty value; everything else is dropped. */
export function campaignParams(input: Record<string, unknown>): Tracking {
  const out: Tracking = {};
  for (const k of CAMPAIGN_KEYS) {
    const v = input[k];
    if (typeof v === "string" && v !== "") out[k] = v.slice(0, MAX_VALUE);
  }
  return out;
}

export class CampaignTokens {
  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: Pick<StoreKeys, "campaign">,
    private readonly ttlSeconds: number = CAMPAIGN_TOKEN_TTL_SECONDS
  ) {}

  async save(params: Tracking): Promise<string> {
    const token = randomBytes(5).toString("hex");
    const key = this.keys.campaign(token);
    await this.store.hset(key, params);
    await this.store.expire(key, this.ttlSeconds);
    return token;
  }

  /**
   * Campaign parameters of a /start payload. An opaque payload is looked up
   * as a token; an unknown or expired token stays as `payload`.
   */
  async resolve(payload: string): Promise<Tracking> {
    const parsed = parseStartPayload(payload);
    const token = parsed.payload;
    if (token === undefined) return parsed;
    const stored = campaignParams(await this.store.hgetall(this.keys.campaign(token)));
    return Object.keys(stored).length > 0 ? stored : parsed;
  }
}
