// src/utils/parseValidate.ts
import { MalformedElementError } from "./errors";

/**
 * Options for parsing integers safely.
 */
export interface SafeParseIntOptions {
  /** Minimum allowed value (inclusive) */
  min?: number;
  /** Maximum allowed value (inclusive) */
  max?: number;
  /** Default value to return if parsing fails or value is out of range */
  defaultValue?: number;
}

/**
 * Safely parses an integer with optional range validation. Lenient: used
 * for environment settings, never for wire tokens.
 *
 * @param value - The value to parse (string, number, null, or undefined)
 * @param options - Optional parsing configuration
 * @returns The parsed integer, default value, or null if parsing fails
 */
export function safeParseInt(
  value: string | number | null | undefined,
  options: SafeParseIntOptions = {}
): number | null {
  const { min, max, defaultValue } = options;

  if (value === null || value === undefined) {
    return defaultValue !== undefined ? defaultValue : null;
  }

  const parsed = typeof value === "number" ? value : parseInt(String(value), 10);

  if (isNaN(parsed)) {
    return defaultValue !== undefined ? defaultValue : null;
  }

  // Range validation
  if (min !== undefined && parsed < min) {
    return defaultValue !== undefined ? defaultValue : null;
  }
  if (max !== undefined && parsed > max) {
    return defaultValue !== undefined ? defaultValue : null;
  }

  return parsed;
}

// --- Strict wire-token parsers ---

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a base-10 integer token. Accepts an optional sign; rejects
 * grouping separators, whitespace and values outside the safe integer range.
 */
export function parseIntegerToken(token: string): number {
  if (!INTEGER_PATTERN.test(token)) {
    throw new MalformedElementError(`"${token}" is not an integer`);
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedElementError(`"${token}" is outside the safe integer range`);
  }
  return value;
}

/**
 * Parses a decimal token in plain (`-12.5`, `.5`, `3.`) or exponential
 * (`1e-3`) form. `NaN`, `Infinity` and hex literals are rejected.
 */
export function parseNumberToken(token: string): number {
  if (!DECIMAL_PATTERN.test(token)) {
    throw new MalformedElementError(`"${token}" is not a decimal number`);
  }
  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new MalformedElementError(`"${token}" does not fit a finite number`);
  }
  return value;
}

/** Case-sensitive: only `true` and `false`. */
export function parseBooleanToken(token: string): boolean {
  if (token === "true") return true;
  if (token === "false") return false;
  throw new MalformedElementError(`"${token}" is not a boolean (expected true or false)`);
}
