/**
 * Shared fixtures: an in-memory runtime with scriptable ports and a clock
 * the test moves by hand.
 */

import { type AppConfig, loadConfig } from "../src/config";
import { MemoryStore } from "../src/infra/memory.store";
import type { AnalyticsPort } from "../src/ports/AnalyticsPort";
import type { ChatMessage, ChatPort } from "../src/ports/ChatPort";
import { type NoopGateway, createNoopGateway } from "../src/ports/GatewayPort";
import { type Runtime, buildRuntime } from "../src/runtime";
import type { Offers } from "../src/services/offers";
import type { EventNotification, OrderNotification } from "../src/types/notifications";
import { type PortError, type PortErrorKind, fail, ok } from "../src/types/result";

export const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

export class FakeClock {
  constructor(public ms: number = T0) {}
  now = (): number => this.ms;
  advance(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

export const TEST_OFFERS: Offers = {
  currency: "GBP",
  currencySymbol: "£",
  followupDiscount: 0.2,
  plans: [
    { id: "week", label: "7 days", amount: 10, days: 7 },
    { id: "lifetime", label: "lifetime", amount: 40, days: null }
  ]
};

export const TEST_ENV: Record<string, string> = {
  STORE_DRIVER: "memory",
  INSTANCE_TAG: "test",
  KEY_PREFIX: "t:",
  CHAT_WEBHOOK_SECRET: "test-chat-secret",
  CHAT_DEEPLINK_URL: "https://t.me/testbot",
  GATEWAY_WEBHOOK_SECRET: "test-secret",
  ADMIN_TOKEN: "test-admin",
  PORTAL_BASE_URL: "https://portal.test/open",
  CHECKOUT_REMINDER_SECONDS: "0",
  FOLLOWUP_DELAY_SECONDS: "360"
};

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...env });
}

/* -----------------------------------------------------------
 * Scriptable ports
 * --------------------------------------------------------- */

export class FakeChat implements ChatPort {
  sent: Array<{ chatId: string; message: ChatMessage }> = [];
  answered: string[] = [];
  webhooks: string[] = [];
  /** Chats that answer with a `blocked` error. */
  blocked = new Set<string>();
  /** Errors returned by the next sends, in order. */
  failures: PortErrorKind[] = [];

  async sendMessage(chatId: string, message: ChatMessage) {
    if (this.blocked.has(chatId)) return fail("blocked", "Forbidden: bot was blocked by the user", 403);
    const kind = this.failures.shift();
    if (kind) return fail(kind, `scripted ${kind}`);
    this.sent.push({ chatId, message });
    return ok({ messageId: this.sent.length });
  }

  async answerCallback(callbackId: string) {
    this.answered.push(callbackId);
    return ok(undefined);
  }

  async setWebhook(url: string) {
    this.webhooks.push(url);
    return ok(undefined);
  }

  textsTo(chatId: string): string[] {
    return this.sent.filter((s) => s.chatId === chatId).map((s) => s.message.text);
  }
}

export class FakeAnalytics implements AnalyticsPort {
  orders: OrderNotification[] = [];
  events: EventNotification[] = [];
  /** While set, every send fails with this error. */
  down: PortError | null = null;
  attempts = 0;

  async sendOrder(order: OrderNotification) {
    this.attempts++;
    if (this.down) return { ok: false as const, error: this.down };
    this.orders.push(order);
    return ok(undefined);
  }

  async sendEvent(event: EventNotification) {
    this.attempts++;
    if (this.down) return { ok: false as const, error: this.down };
    this.events.push(event);
    return ok(undefined);
  }
}

/* -----------------------------------------------------------
 * Runtime
 * --------------------------------------------------------- */

export interface TestRig {
  rt: Runtime;
  store: MemoryStore;
  chat: FakeChat;
  gateway: NoopGateway;
  analytics: FakeAnalytics;
  clock: FakeClock;
}

export function buildTestRig(env: Record<string, string> = {}, gateway: NoopGateway = createNoopGateway()): TestRig {
  const clock = new FakeClock();
  const store = new MemoryStore(clock.now);
  const chat = new FakeChat();
  const analytics = new FakeAnalytics();
  const rt = buildRuntime(testConfig(env), { store, chat, gateway, analytics, offers: TEST_OFFERS, now: clock.now });
  return { rt, store, chat, gateway, analytics, clock };
}

/* -----------------------------------------------------------
 * Raw chat updates
 * --------------------------------------------------------- */

export function startUpdate(userId: number, payload = ""): string {
  const text = payload ? `/start ${payload}` : "/start";
  return JSON.stringify({ update_id: userId, message: { chat: { id: userId }, from: { id: userId }, text } });
}

export function callbackUpdate(userId: number, data: string, callbackId = `cb-${userId}`): string {
  return JSON.stringify({ update_id: userId, callback_query: { id: callbackId, from: { id: userId }, message: { chat: { id: userId } }, data } });
}

export function textUpdate(userId: number, text: string): string {
  return JSON.stringify({ update_id: userId, message: { chat: { id: userId }, from: { id: userId }, text } });
}
