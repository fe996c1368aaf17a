import { ValidationError } from "./errors.js";

/**
 * Split `total` units into `n` near-equal counts.
 *
 * The first `total % n` entries get one extra unit. When `n > total` the
 * trailing entries are zero.
 */
export function divide(total: number, n: number): number[] {
  if (!Number.isSafeInteger(total) || total < 0) {
    throw new ValidationError(
      `Total must be a non-negative integer, got ${total}`,
    );
  }
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new ValidationError(
      `Partition count must be a positive integer, got ${n}`,
    );
  }

  const base = Math.floor(total / n);
  const remainder = total % n;
  return Array.from({ length: n }, (_, i) => (i < remainder ? base + 1 : base));
}
