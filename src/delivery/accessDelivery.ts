/**
 * Idempotent access delivery.
 *
 * Delivery Record ({p}delivery:{subject}): access_key, sent, sending, updated_at.
 * Access keys ({p}access:{key}): subject_id, created_at, 7 day expiry.
 *
 * - The access key is created lazily and claimed with HSETNX, so concurrent
 *   callers converge on one key.
 * - An unforced send is claimed with HSETNX on `sending`; a caller that
 *   loses the claim does not send. The claim is released when the send
 *   fails, and taken over once it is older than SENDING_STALE_SECONDS (a
 *   process that died mid-send).
 * - `sent=1` is written only after the chat platform accepted the message.
 * - Already sent and not forced: no send, same key back.
 */

import { randomBytes } from "crypto";
import { createLogger } from "../infra/logger";
import type { ChatPort } from "../ports/ChatPort";
import type { KeyValueStore } from "../ports/KeyValueStore";
import type { SubjectRepository } from "../services/subjects";
import { accessMessage } from "../services/copy";
import type { StoreKeys } from "../store/keys";
import { Result, fail, ok } from "../types/result";

const ACCESS_KEY_TTL_SECONDS = 7 * 24 * 60 * 60;
const DELIVERY_TTL_SECONDS = 30 * 24 * 60 * 60;
const SENDING_STALE_SECONDS = 120;

export interface Delivery {
  sentNow: boolean;
  accessKey: string;
}

export interface AccessDeliveryOptions {
  portalBaseUrl: string;
  now?: () => number;
}

const log = createLogger("delivery");

export function generateAccessKey(): string {
  return randomBytes(10).toString("base64url");
}

export function portalLink(base: string, accessKey: string): string {
  const sep = base.includes("?") ? "&" : "?";
  return `${base}${sep}key=${encodeURIComponent(accessKey)}`;
}

export class AccessDelivery {
  private readonly now: () => number;

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: StoreKeys,
    private readonly subjects: SubjectRepository,
    private readonly chat: ChatPort,
    private readonly opts: AccessDeliveryOptions
  ) {
    this.now = opts.now ?? Date.now;
  }

  async deliverIfNeeded(subjectId: string, opts: { forceResend?: boolean } = {}): Promise<Result<Delivery>> {
    const chatId = await this.subjects.chatIdOf(subjectId);
    if (!chatId) return fail("rejected", "subject has no chat address");

    const recordKey = this.keys.delivery(subjectId);
    const accessKey = await this.ensureAccessKey(subjectId, recordKey);
    const sent = (await this.store.hget(recordKey, "sent")) === "1";
    const forced = opts.forceResend === true;
    if (!forced) {
      if (sent) return ok({ sentNow: false, accessKey });
      if (!(await this.claimSend(recordKey))) {
        log.debug("access delivery already in progress", { subjectId });
        return ok({ sentNow: false, accessKey });
      }
    }

    const res = await this.chat.sendMessage(chatId, accessMessage(portalLink(this.opts.portalBaseUrl, accessKey), accessKey));
    if (!res.ok) {
      if (!forced) await this.store.hdel(recordKey, "sending");
      if (res.error.kind === "blocked") await this.subjects.markBlocked(subjectId);
      log.warn("access delivery failed", { subjectId, kind: res.error.kind, error: res.error.message });
      return res;
    }

    await this.store.hset(recordKey, { sent: "1", updated_at: this.seconds() });
    if (!forced) await this.store.hdel(recordKey, "sending");
    await this.store.expire(recordKey, DELIVERY_TTL_SECONDS);
    log.info("access delivered", { subjectId, resend: sent });
    return ok({ sentNow: true, accessKey });
  }

  /** Subject owning an access key, or null when unknown or expired. */
  async lookup(accessKey: string): Promise<string | null> {
    return (await this.store.hget(this.keys.accessKey(accessKey), "subject_id")) || null;
  }

  private async claimSend(recordKey: string): Promise<boolean> {
    const ts = this.seconds();
    if (await this.store.hsetnx(recordKey, "sending", ts)) return true;
    const since = Number((await this.store.hget(recordKey, "sending")) ?? ts);
    if (Number(ts) - since < SENDING_STALE_SECONDS) return false;
    await this.store.hset(recordKey, { sending: ts });
    return true;
  }

  private async ensureAccessKey(subjectId: string, recordKey: string): Promise<string> {
    const existing = await this.store.hget(recordKey, "access_key");
    if (existing) {
      await this.saveAccessKey(existing, subjectId);
      return existing;
    }
    const candidate = generateAccessKey();
    const won = await this.store.hsetnx(recordKey, "access_key", candidate);
    const accessKey = won ? candidate : (await this.store.hget(recordKey, "access_key")) ?? candidate;
    await this.store.expire(recordKey, DELIVERY_TTL_SECONDS);
    await this.saveAccessKey(accessKey, subjectId);
    return accessKey;
  }

  /** (Re)write the key mapping; refreshes its expiry on every delivery. */
  private async saveAccessKey(accessKey: string, subjectId: string): Promise<void> {
    const key = this.keys.accessKey(accessKey);
    await this.store.hset(key, { subject_id: subjectId, created_at: this.seconds() });
    await this.store.expire(key, ACCESS_KEY_TTL_SECONDS);
  }

  private seconds(): string {
    return String(Math.floor(this.now() / 1000));
  }
}
