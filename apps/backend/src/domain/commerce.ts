/**
 * Commerce domain: row shapes for the catalog, carts, orders and the payment ledger.
 *
 * Rows mirror their SQLite tables column-for-column. Money is integer cents,
 * timestamps are epoch seconds, flags are 0/1 integers.
 */

export const CART_STATUSES = ["open", "checked_out", "expired", "abandoned"] as const;
export type CartStatus = (typeof CART_STATUSES)[number];

export const ORDER_STATUSES = ["pending", "paid", "refunded", "partially_refunded", "cancelled"] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_METHODS = ["stripe", "comp", "credit", "manual"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const PAYMENT_STATUSES = ["pending", "processing", "succeeded", "failed", "refunded"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const CREDIT_STATUSES = ["available", "applied", "expired"] as const;
export type CreditStatus = (typeof CREDIT_STATUSES)[number];

export const VOUCHER_TYPES = ["comp", "percentage", "fixed_amount"] as const;
export type VoucherType = (typeof VOUCHER_TYPES)[number];

export interface ConferenceRow {
  id: number;
  slug: string;
  name: string;
  total_capacity: number;
  stripe_secret_key: string | null;
  stripe_webhook_secret: string | null;
  is_active: number;
  created_at: number;
}

/** Fields shared by anything that can sit on a cart line. */
export interface SellableRow {
  id: number;
  conference_id: number;
  name: string;
  price_cents: number;
  total_quantity: number;
  available_from: number | null;
  available_until: number | null;
  limit_per_user: number;
  is_active: number;
}

export interface TicketTypeRow extends SellableRow {
  requires_voucher: number;
  created_at: number;
}

export interface AddOnRow extends SellableRow {
  created_at: number;
}

export interface AddOn extends AddOnRow {
  required_ticket_type_ids: number[];
}

export interface VoucherRow {
  id: number;
  conference_id: number;
  code: string;
  voucher_type: VoucherType;
  discount_value: number;
  max_uses: number;
  times_used: number;
  valid_from: number | null;
  valid_until: number | null;
  unlocks_hidden_tickets: number;
  is_active: number;
  created_at: number;
}

export interface Voucher extends VoucherRow {
  applicable_ticket_type_ids: number[];
  applicable_addon_ids: number[];
}

export interface CartRow {
  id: number;
  user_id: string;
  conference_id: number;
  status: CartStatus;
  voucher_id: number | null;
  expires_at: number;
  created_at: number;
  updated_at: number;
}

export interface CartItemRow {
  id: number;
  cart_id: number;
  ticket_type_id: number | null;
  addon_id: number | null;
  quantity: number;
  created_at: number;
}

export interface OrderRow {
  id: number;
  conference_id: number;
  user_id: string;
  status: OrderStatus;
  subtotal: number;
  discount_amount: number;
  total: number;
  voucher_code: string | null;
  voucher_details: string | null;
  reference: string;
  hold_expires_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface OrderLineItemRow {
  id: number;
  order_id: number;
  description: string;
  quantity: number;
  unit_price: number;
  discount_amount: number;
  line_total: number;
  ticket_type_id: number | null;
  addon_id: number | null;
}

export interface PaymentRow {
  id: number;
  order_id: number;
  method: PaymentMethod;
  status: PaymentStatus;
  amount: number;
  stripe_payment_intent_id: string | null;
  stripe_charge_id: string | null;
  credit_id: number | null;
  reference: string | null;
  note: string | null;
  created_at: number;
  updated_at: number;
}

export interface CreditRow {
  id: number;
  user_id: string;
  conference_id: number;
  amount: number;
  remaining_amount: number;
  status: CreditStatus;
  source_order_id: number | null;
  applied_to_order_id: number | null;
  note: string | null;
  created_at: number;
  updated_at: number;
}

/** Frozen copy of the voucher as it was at checkout. */
export interface VoucherSnapshot {
  code: string;
  type: VoucherType;
  value: number;
}

export interface OrderWithLines extends OrderRow {
  line_items: OrderLineItemRow[];
}
