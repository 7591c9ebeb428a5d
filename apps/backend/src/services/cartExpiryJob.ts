/**
 * Cart Expiry Job
 * Background timer that marks overdue open carts as expired.
 *
 * Key behaviors:
 * - Only open carts past expires_at are touched; checked-out carts never are
 * - Pending orders are NOT swept: their inventory hold lapses by predicate in
 *   the Inventory Ledger, so a late payment can still settle the order
 * - Reads are lazy anyway (getOrCreateOpenCart expires on access); this keeps
 *   the carts table tidy between visits
 */

import type { Logger } from "pino";
import type { Clock } from "../domain/clock";
import type { CartRepository } from "../repositories/cartRepository";

const DEFAULT_INTERVAL_MS = 5 * 60 * 1000; // 5 minutes

export interface CartExpiryResult {
  expired: number;
  errors: number;
  skipped: boolean;
}

export class CartExpiryJob {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private readonly logger: Logger;

  constructor(
    private readonly carts: CartRepository,
    private readonly clock: Clock,
    logger: Logger,
    private readonly intervalMs: number = DEFAULT_INTERVAL_MS
  ) {
    this.logger = logger.child({ module: "cartExpiryJob" });
  }

  start(): void {
    if (this.intervalHandle) {
      this.logger.warn("Cart expiry job already running");
      return;
    }

    this.logger.info({ intervalMs: this.intervalMs }, "Starting cart expiry job");

    // Run immediately on start
    this.runOnce();

    this.intervalHandle = setInterval(() => {
      this.runOnce();
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.info("Cart expiry job stopped");
    }
  }

  runOnce(): CartExpiryResult {
    if (this.isRunning) {
      this.logger.debug("Cart expiry already running, skipping");
      return { expired: 0, errors: 0, skipped: true };
    }

    this.isRunning = true;
    const result: CartExpiryResult = { expired: 0, errors: 0, skipped: false };

    try {
      result.expired = this.carts.expireStale(this.clock.now());
      if (result.expired > 0) {
        this.logger.info({ expired: result.expired }, "Expired stale carts");
      } else {
        this.logger.debug("No stale carts found");
      }
    } catch (error) {
      result.errors++;
      this.logger.error({ err: error }, "Cart expiry job failed");
    } finally {
      this.isRunning = false;
    }

    return result;
  }

  isActive(): boolean {
    return this.intervalHandle !== null;
  }
}
