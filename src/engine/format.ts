export const DEFAULT_PRECISION = 10;

/** Minus sign used on the keypad and in formatted results */
export const MINUS_SIGN = "−";

// Beyond this magnitude toFixed() falls back to exponent notation
const FIXED_LIMIT = 1e21;

/**
 * Round to a number of decimal places using the decimal string form,
 * so 0.1 + 0.2 rounds to 0.3 rather than 0.30000000000000004
 */
export function roundTo(value: number, places: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= FIXED_LIMIT) {
    return value;
  }
  return Number(value.toFixed(places));
}

/**
 * Format an evaluation result for the display.
 *
 * Always plain decimal notation, so the result can be read back as the
 * start of the next expression. Integers are shown without a decimal point,
 * other values without trailing zeros. Negative zero is shown as "0".
 */
export function formatResult(value: number, precision: number = DEFAULT_PRECISION): string {
  const rounded = roundTo(value, precision);

  if (rounded === 0) {
    return "0";
  }

  if (!Number.isFinite(rounded)) {
    return String(rounded);
  }

  const digits = toPlainDecimal(Math.abs(rounded), precision);
  return rounded < 0 ? MINUS_SIGN + digits : digits;
}

function toPlainDecimal(magnitude: number, precision: number): string {
  // Every double this large is an integer, and BigInt prints it in full
  if (magnitude >= FIXED_LIMIT) {
    return BigInt(magnitude).toString();
  }

  const fixed = magnitude.toFixed(precision);
  if (!fixed.includes(".")) {
    return fixed;
  }
  return fixed.replace(/0+$/, "").replace(/\.$/, "");
}
