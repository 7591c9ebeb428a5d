/**
 * Shared test fixtures: an in-memory database with every migration applied,
 * a manual clock, a silent logger, catalog seeders and an in-process payment
 * gateway. Nothing here touches the network or the filesystem.
 */

import pino from "pino";
import Stripe from "stripe";
import type { Database } from "better-sqlite3";
import { createContext, type AppContext } from "../app/context";
import { envSchema, toRuntimeConfig, type RuntimeConfig } from "../config";
import { openMemoryDatabase } from "../db/connection";
import { ManualClock } from "../domain/clock";
import type { ConferenceRow, OrderWithLines, VoucherType } from "../domain/commerce";
import type { OrderPaidNotifier } from "../services/notifications";
import { StripeGateway, type CreatedPaymentIntent, type PaymentIntentRequest } from "../services/stripeGateway";
import { runMigrations } from "../migrate";

/** 2026-01-01T00:00:00Z */
export const T0 = 1_767_225_600;

export const TEST_STRIPE_SECRET_KEY = "sk_test_placeholder";
export const TEST_WEBHOOK_SECRET = "whsec_test_secret";
export const TEST_ADMIN_KEY = "test-admin-key";

export const silentLogger = pino({ level: "silent" });

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  const base = toRuntimeConfig(
    envSchema.parse({
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      ADMIN_API_KEY: TEST_ADMIN_KEY,
      CART_EXPIRY_SWEEP_ENABLED: "false",
    })
  );
  return Object.freeze({ ...base, ...overrides });
}

export function createTestDb(): Database {
  const db = openMemoryDatabase();
  runMigrations(db);
  return db;
}

/**
 * Real Stripe signature verification, fake PaymentIntent creation. Every
 * request is recorded so tests can assert what would have been sent, and a
 * repeated idempotency key returns the intent created for it, as Stripe does.
 */
export class FakePaymentGateway extends StripeGateway {
  readonly created: Array<{ conferenceSlug: string; request: PaymentIntentRequest; intent: CreatedPaymentIntent }> = [];
  private readonly byIdempotencyKey = new Map<string, CreatedPaymentIntent>();
  private sequence = 0;

  constructor(webhookToleranceSec = 300) {
    super(silentLogger, { webhookToleranceSec });
  }

  async createPaymentIntent(conference: ConferenceRow, request: PaymentIntentRequest): Promise<CreatedPaymentIntent> {
    let intent = this.byIdempotencyKey.get(request.idempotencyKey);
    if (!intent) {
      this.sequence++;
      intent = { id: `pi_test_${this.sequence}`, clientSecret: `pi_test_${this.sequence}_secret_placeholder` };
      this.byIdempotencyKey.set(request.idempotencyKey, intent);
    }
    this.created.push({ conferenceSlug: conference.slug, request, intent });
    return intent;
  }
}

export class RecordingNotifier implements OrderPaidNotifier {
  readonly notified: string[] = [];

  async notifyOrderPaid(order: { reference: string }): Promise<void> {
    this.notified.push(order.reference);
  }
}

export interface TestContext {
  ctx: AppContext;
  db: Database;
  clock: ManualClock;
  gateway: FakePaymentGateway;
  notifier: RecordingNotifier;
}

export function createTestContext(
  options: { config?: Partial<RuntimeConfig>; generateReference?: (prefix: string) => string } = {}
): TestContext {
  const db = createTestDb();
  const clock = new ManualClock(T0);
  const gateway = new FakePaymentGateway();
  const notifier = new RecordingNotifier();
  const ctx = createContext({
    config: testConfig(options.config),
    logger: silentLogger,
    db,
    clock,
    paymentGateway: gateway,
    notifier,
    generateReference: options.generateReference,
  });
  return { ctx, db, clock, gateway, notifier };
}

// -----------------------------------------------------------------------------
// Catalog seeders
// -----------------------------------------------------------------------------

export function seedConference(
  db: Database,
  overrides: { slug?: string; name?: string; totalCapacity?: number; stripe?: boolean } = {}
): number {
  const stripe = overrides.stripe ?? true;
  const result = db
    .prepare(
      `INSERT INTO conferences (slug, name, total_capacity, stripe_secret_key, stripe_webhook_secret, is_active, created_at)
       VALUES (?, ?, ?, ?, ?, 1, ?)`
    )
    .run(
      overrides.slug ?? "devconf",
      overrides.name ?? "DevConf 2026",
      overrides.totalCapacity ?? 0,
      stripe ? TEST_STRIPE_SECRET_KEY : null,
      stripe ? TEST_WEBHOOK_SECRET : null,
      T0
    );
  return Number(result.lastInsertRowid);
}

export interface TicketTypeSeed {
  name?: string;
  priceCents?: number;
  totalQuantity?: number;
  limitPerUser?: number;
  requiresVoucher?: boolean;
  availableFrom?: number | null;
  availableUntil?: number | null;
  isActive?: boolean;
}

export function seedTicketType(db: Database, conferenceId: number, seed: TicketTypeSeed = {}): number {
  const result = db
    .prepare(
      `INSERT INTO ticket_types (
         conference_id, name, price_cents, total_quantity, available_from, available_until,
         limit_per_user, requires_voucher, is_active, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      conferenceId,
      seed.name ?? "General Admission",
      seed.priceCents ?? 10000,
      seed.totalQuantity ?? 0,
      seed.availableFrom ?? null,
      seed.availableUntil ?? null,
      seed.limitPerUser ?? 10,
      seed.requiresVoucher ? 1 : 0,
      seed.isActive === false ? 0 : 1,
      T0
    );
  return Number(result.lastInsertRowid);
}

export function seedAddon(
  db: Database,
  conferenceId: number,
  seed: { name?: string; priceCents?: number; totalQuantity?: number; limitPerUser?: number; requires?: number[] } = {}
): number {
  const result = db
    .prepare(
      `INSERT INTO addons (conference_id, name, price_cents, total_quantity, limit_per_user, is_active, created_at)
       VALUES (?, ?, ?, ?, ?, 1, ?)`
    )
    .run(
      conferenceId,
      seed.name ?? "Workshop",
      seed.priceCents ?? 5000,
      seed.totalQuantity ?? 0,
      seed.limitPerUser ?? 10,
      T0
    );
  const addonId = Number(result.lastInsertRowid);
  const link = db.prepare("INSERT INTO addon_required_ticket_types (addon_id, ticket_type_id) VALUES (?, ?)");
  for (const ticketTypeId of seed.requires ?? []) {
    link.run(addonId, ticketTypeId);
  }
  return addonId;
}

export interface VoucherSeed {
  code?: string;
  type?: VoucherType;
  value?: number;
  maxUses?: number;
  timesUsed?: number;
  validFrom?: number | null;
  validUntil?: number | null;
  unlocksHiddenTickets?: boolean;
  isActive?: boolean;
  ticketTypeIds?: number[];
  addonIds?: number[];
}

export function seedVoucher(db: Database, conferenceId: number, seed: VoucherSeed = {}): number {
  const result = db
    .prepare(
      `INSERT INTO vouchers (
         conference_id, code, voucher_type, discount_value, max_uses, times_used,
         valid_from, valid_until, unlocks_hidden_tickets, is_active, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      conferenceId,
      seed.code ?? "SAVE20",
      seed.type ?? "percentage",
      seed.value ?? 2000,
      seed.maxUses ?? 10,
      seed.timesUsed ?? 0,
      seed.validFrom ?? null,
      seed.validUntil ?? null,
      seed.unlocksHiddenTickets ? 1 : 0,
      seed.isActive === false ? 0 : 1,
      T0
    );
  const voucherId = Number(result.lastInsertRowid);
  const linkTicket = db.prepare("INSERT INTO voucher_ticket_types (voucher_id, ticket_type_id) VALUES (?, ?)");
  for (const id of seed.ticketTypeIds ?? []) linkTicket.run(voucherId, id);
  const linkAddon = db.prepare("INSERT INTO voucher_addons (voucher_id, addon_id) VALUES (?, ?)");
  for (const id of seed.addonIds ?? []) linkAddon.run(voucherId, id);
  return voucherId;
}

export function voucherTimesUsed(db: Database, voucherId: number): number {
  const row = db
    .prepare<[number], { times_used: number }>("SELECT times_used FROM vouchers WHERE id = ?")
    .get(voucherId);
  return row?.times_used ?? -1;
}

// -----------------------------------------------------------------------------
// Stripe webhook helpers
// -----------------------------------------------------------------------------

const signer = new Stripe(TEST_STRIPE_SECRET_KEY);

export function stripeEventPayload(id: string, type: string, object: Record<string, unknown>): string {
  return JSON.stringify({ id, object: "event", type, api_version: "2024-06-20", data: { object } });
}

export function signPayload(payload: string, secret: string = TEST_WEBHOOK_SECRET): string {
  return signer.webhooks.generateTestHeaderString({ payload, secret });
}

// -----------------------------------------------------------------------------
// Flow helpers
// -----------------------------------------------------------------------------

export function must<T>(value: T | undefined | null, what = "value"): T {
  if (value === undefined || value === null) {
    throw new Error(`expected ${what} to be present`);
  }
  return value;
}

/** Open a cart for `userId`, add `quantity` of one ticket type and check out. */
export function checkoutTickets(
  ctx: AppContext,
  userId: string,
  conferenceId: number,
  ticketTypeId: number,
  quantity = 1
): OrderWithLines {
  const cart = ctx.cartService.getOrCreateOpenCart(userId, conferenceId);
  ctx.cartService.addTicket(cart.id, ticketTypeId, quantity);
  return ctx.checkoutService.checkout(cart.id);
}
