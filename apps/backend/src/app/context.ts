/**
 * AppContext: Composition root for the registration backend.
 *
 * Defines the application context interface and the createContext() factory
 * that wires repositories, services and background jobs. server.ts and the
 * route modules only ever see the finished context, and tests build their own
 * with an in-memory database, a manual clock and a fake payment gateway.
 */

import pino, { type Logger } from "pino";
import type { Database } from "better-sqlite3";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { systemClock, type Clock } from "../domain/clock";
import { CatalogRepository } from "../repositories/catalogRepository";
import { CartRepository } from "../repositories/cartRepository";
import { VoucherRepository } from "../repositories/voucherRepository";
import { OrderRepository } from "../repositories/orderRepository";
import { CreditRepository } from "../repositories/creditRepository";
import { StripeEventRepository } from "../repositories/stripeEventRepository";
import { InventoryLedger } from "../services/inventoryLedger";
import { VoucherService } from "../services/voucherService";
import { CartService } from "../services/cartService";
import { CheckoutService, type CheckoutOptions } from "../services/checkoutService";
import { OrderLedger } from "../services/orderLedger";
import { PaymentService } from "../services/paymentService";
import { StripeGateway, type PaymentGateway } from "../services/stripeGateway";
import { LoggingOrderPaidNotifier, type OrderPaidNotifier } from "../services/notifications";
import { PaymentEventHandlers } from "../services/webhooks/paymentHandlers";
import { WebhookDispatcher } from "../services/webhooks/webhookDispatcher";
import { CartExpiryJob } from "../services/cartExpiryJob";

export { runtimeConfig };

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  db: Database;
  clock: Clock;

  catalog: CatalogRepository;
  carts: CartRepository;
  vouchers: VoucherRepository;
  orders: OrderRepository;
  credits: CreditRepository;
  stripeEvents: StripeEventRepository;

  inventoryLedger: InventoryLedger;
  voucherService: VoucherService;
  cartService: CartService;
  checkoutService: CheckoutService;
  orderLedger: OrderLedger;
  paymentGateway: PaymentGateway;
  paymentService: PaymentService;
  notifier: OrderPaidNotifier;
  webhookDispatcher: WebhookDispatcher;
  cartExpiryJob: CartExpiryJob;

  // Shutdown state and helpers
  isShuttingDown: () => boolean;
  setShuttingDown: (value: boolean) => void;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(config: RuntimeConfig = runtimeConfig): Logger {
  const destination = pino.destination({ sync: config.nodeEnv !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level: config.logLevel }, destination);
}

// -----------------------------------------------------------------------------
// Context factory
// -----------------------------------------------------------------------------

export interface ContextOverrides {
  config?: RuntimeConfig;
  logger?: Logger;
  db?: Database;
  clock?: Clock;
  paymentGateway?: PaymentGateway;
  notifier?: OrderPaidNotifier;
  generateReference?: CheckoutOptions["generateReference"];
}

export function createContext(overrides: ContextOverrides = {}): AppContext {
  const config = overrides.config ?? runtimeConfig;
  const logger = overrides.logger ?? createLogger(config);
  const db = overrides.db ?? openDatabase(config.sqlitePath);
  const clock = overrides.clock ?? systemClock;

  const catalog = new CatalogRepository(db);
  const carts = new CartRepository(db);
  const vouchers = new VoucherRepository(db);
  const orders = new OrderRepository(db);
  const credits = new CreditRepository(db);
  const stripeEvents = new StripeEventRepository(db);

  const inventoryLedger = new InventoryLedger(db, clock, logger);
  const voucherService = new VoucherService(vouchers, clock);
  const cartService = new CartService(db, carts, catalog, vouchers, voucherService, inventoryLedger, clock, logger, {
    cartTtlMinutes: config.cartExpiryMinutes,
  });
  const checkoutService = new CheckoutService(db, carts, orders, cartService, voucherService, clock, logger, {
    holdMinutes: config.pendingOrderHoldMinutes,
    referencePrefix: config.orderReferencePrefix,
    generateReference: overrides.generateReference,
  });

  const notifier = overrides.notifier ?? new LoggingOrderPaidNotifier(logger);
  const orderLedger = new OrderLedger(db, orders, credits, voucherService, notifier, clock, logger);

  const paymentGateway =
    overrides.paymentGateway ?? new StripeGateway(logger, { webhookToleranceSec: config.stripeWebhookToleranceSec });
  const paymentService = new PaymentService(db, orders, catalog, paymentGateway, clock, logger, {
    currency: config.currency,
  });

  const handlers = new PaymentEventHandlers(orders, orderLedger, clock, logger);
  const webhookDispatcher = new WebhookDispatcher(
    db,
    catalog,
    stripeEvents,
    paymentGateway,
    handlers,
    notifier,
    clock,
    logger
  );

  const cartExpiryJob = new CartExpiryJob(carts, clock, logger, config.cartExpirySweepIntervalMs);

  let shuttingDown = false;

  return {
    config,
    logger,
    db,
    clock,
    catalog,
    carts,
    vouchers,
    orders,
    credits,
    stripeEvents,
    inventoryLedger,
    voucherService,
    cartService,
    checkoutService,
    orderLedger,
    paymentGateway,
    paymentService,
    notifier,
    webhookDispatcher,
    cartExpiryJob,
    isShuttingDown: () => shuttingDown,
    setShuttingDown: (value: boolean) => {
      shuttingDown = value;
    },
  };
}
