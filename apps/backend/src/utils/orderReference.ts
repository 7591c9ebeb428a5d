import { randomInt } from "node:crypto";

const REFERENCE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const REFERENCE_SUFFIX_LENGTH = 8;

/**
 * Human-readable order reference: `${prefix}-${8 uppercase alphanumerics}`,
 * e.g. ORD-7K2Q9XMB. Uniqueness is enforced by the orders table; callers retry
 * on collision.
 */
export function generateOrderReference(prefix: string): string {
  let suffix = "";
  for (let i = 0; i < REFERENCE_SUFFIX_LENGTH; i++) {
    suffix += REFERENCE_ALPHABET[randomInt(REFERENCE_ALPHABET.length)];
  }
  return `${prefix}-${suffix}`;
}

export const ORDER_REFERENCE_PATTERN = /^[A-Z0-9_-]+-[A-Z0-9]{8}$/;
