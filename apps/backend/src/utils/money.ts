/**
 * Integer-cent arithmetic.
 *
 * Amounts are always whole cents; anything that would produce a fraction of a
 * cent goes through roundHalfUpDiv instead of floating point division.
 */

/** round(numerator / denominator), halves rounded away from zero. Operands must be >= 0. */
export function roundHalfUpDiv(numerator: number, denominator: number): number {
  if (denominator <= 0) {
    throw new RangeError(`denominator must be positive, got ${denominator}`);
  }
  if (numerator < 0) {
    throw new RangeError(`numerator must be non-negative, got ${numerator}`);
  }
  return Math.floor((2 * numerator + denominator) / (2 * denominator));
}
