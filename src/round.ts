/**
 * Round to `digits` decimals. Values exactly halfway between two results go
 * to the even one; everything else rounds by its exact binary value, so
 * 2.675 becomes 2.67 and 0.125 becomes 0.12.
 */
export function roundHalfEven(value: number, digits = 2): number {
  // An exact decimal tie at `digits` places is odd / 2^(digits + 1); scaling
  // by a power of two is exact, so this detects ties without error.
  const halves = value * 2 ** (digits + 1);
  if (Number.isInteger(halves) && Math.abs(halves % 2) === 1) {
    const factor = 10 ** digits;
    const lower = Math.floor(value * factor);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return even / factor;
  }
  return Number(value.toFixed(digits));
}

/** Render like a float column in an exported sheet: integers keep a ".0". */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
