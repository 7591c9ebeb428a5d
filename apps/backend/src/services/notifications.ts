import type { Logger } from "pino";
import type { OrderRow } from "../domain/commerce";

/**
 * Fired once an order reaches `paid`. Always invoked after the transaction that
 * paid the order has committed; implementations may do I/O.
 */
export interface OrderPaidNotifier {
  notifyOrderPaid(order: OrderRow): Promise<void>;
}

/** Default notifier: emits a structured log line for downstream mailers to pick up. */
export class LoggingOrderPaidNotifier implements OrderPaidNotifier {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ module: "orderPaidNotifier" });
  }

  async notifyOrderPaid(order: OrderRow): Promise<void> {
    this.logger.info(
      { orderId: order.id, reference: order.reference, userId: order.user_id, total: order.total },
      "Order paid"
    );
  }
}

/**
 * Deliver notifications for orders paid inside a committed transaction.
 * A failing notifier is logged and never undoes the payment.
 */
export async function deliverOrderPaid(
  notifier: OrderPaidNotifier,
  orders: readonly OrderRow[],
  logger: Logger
): Promise<void> {
  for (const order of orders) {
    try {
      await notifier.notifyOrderPaid(order);
    } catch (error) {
      logger.error({ err: error, orderId: order.id, reference: order.reference }, "Order-paid notification failed");
    }
  }
}
