// src/utils/numberFormat.ts
import { ValidationViolationError } from "./errors";

/** Most fractional digits a number keeps on the wire. */
export const MAX_FRACTION_DIGITS = 6;

// A double sits exactly halfway between two 6-digit neighbours only when it
// is an odd multiple of 2^-7 (its expansion then ends in a 5 at the 7th digit).
const TIE_SCALE = 2 ** (MAX_FRACTION_DIGITS + 1);

// Above this, toFixed switches to exponential notation.
const TO_FIXED_LIMIT = 1e21;

/**
 * Renders a number in its canonical wire form: `.` as the decimal
 * separator, no grouping, no exponent, at most six fractional digits
 * rounded half-to-even, trailing zeros and a dangling point removed.
 *
 * @example canonicalNumber(5) === "5"
 * @example canonicalNumber(-73.98765432) === "-73.987654"
 * @throws ValidationViolationError for NaN and infinities
 */
export function canonicalNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new ValidationViolationError(`Cannot format non-finite number ${value}`);
  }

  const magnitude = Math.abs(value);
  const digits =
    magnitude >= TO_FIXED_LIMIT
      ? BigInt(magnitude).toString()
      : stripTrailingZeros(roundHalfEven(magnitude));

  // Anything that rounds to zero (including -0) renders unsigned.
  if (digits === "0") return "0";
  return value < 0 ? `-${digits}` : digits;
}

/**
 * toFixed resolves exact ties upwards; flip those to the even neighbour.
 */
function roundHalfEven(magnitude: number): string {
  const rounded = magnitude.toFixed(MAX_FRACTION_DIGITS);
  const scaled = magnitude * TIE_SCALE;
  if (!Number.isInteger(scaled) || scaled % 2 === 0) {
    return rounded;
  }

  // Exact value has seven fractional digits, the last being the 5.
  const exact = magnitude.toFixed(MAX_FRACTION_DIGITS + 1);
  const lower = exact.slice(0, -1);
  const lastDigit = Number(lower.charAt(lower.length - 1));
  return lastDigit % 2 === 0 ? lower : rounded;
}

function stripTrailingZeros(fixed: string): string {
  if (!fixed.includes(".")) return fixed;
  return fixed.replace(/0+$/, "").replace(/\.$/, "");
}
