import { z } from "zod";

/**
 * Shapes of the Stripe objects the payment handlers read. Only the fields we
 * use are declared; everything else in the payload is passed through and ignored.
 */

const expandableId = z.union([z.string(), z.object({ id: z.string() })]);

export const eventEnvelopeSchema = z.object({
  id: z.string(),
  type: z.string(),
  data: z.object({ object: z.unknown() }),
});

export const paymentIntentSchema = z.object({
  id: z.string(),
  amount: z.number().int(),
  amount_received: z.number().int().optional(),
  metadata: z.record(z.string()).default({}),
  latest_charge: expandableId.nullable().optional(),
  last_payment_error: z
    .object({ message: z.string().optional(), code: z.string().optional() })
    .nullable()
    .optional(),
});

export const chargeSchema = z.object({
  id: z.string(),
  amount: z.number().int(),
  amount_refunded: z.number().int(),
  payment_intent: expandableId.nullable(),
});

export const disputeSchema = z.object({
  id: z.string(),
  amount: z.number().int(),
  reason: z.string(),
  charge: expandableId.nullable().optional(),
});

export type PaymentIntentObject = z.infer<typeof paymentIntentSchema>;
export type ChargeObject = z.infer<typeof chargeSchema>;
export type DisputeObject = z.infer<typeof disputeSchema>;

export function idOf(value: z.infer<typeof expandableId> | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : value.id;
}
