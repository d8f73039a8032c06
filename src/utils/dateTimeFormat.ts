// src/utils/dateTimeFormat.ts
import { format, isValid, parse } from "date-fns";
import { MalformedElementError, ValidationViolationError } from "./errors";

/**
 * Local date-time pattern used by `depart_at` and `arrive_by`.
 * Minutes precision, no zone designator.
 */
export const ISO_8601_PATTERN = "yyyy-MM-dd'T'HH:mm";

const ISO_8601_SHAPE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/;

/**
 * Formats a departure/arrival time in local time, e.g. `2024-01-15T10:05`.
 */
export function formatDateTime(date: Date | null | undefined): string | null {
  if (date === null || date === undefined) {
    return null;
  }
  if (!isValid(date)) {
    throw new ValidationViolationError("Cannot format an invalid date");
  }
  return format(date, ISO_8601_PATTERN);
}

/**
 * Reads a `yyyy-MM-ddTHH:mm` value back as a local Date.
 */
export function parseDateTime(input: string | null | undefined): Date | null {
  if (input === null || input === undefined) {
    return null;
  }
  // date-fns accepts single-digit fields for MM/dd/HH; the wire form does not.
  if (!ISO_8601_SHAPE.test(input)) {
    throw new MalformedElementError(`"${input}" does not match ${ISO_8601_PATTERN}`);
  }
  const parsed = parse(input, ISO_8601_PATTERN, new Date(0));
  if (!isValid(parsed)) {
    throw new MalformedElementError(`"${input}" is not a valid date-time`);
  }
  return parsed;
}
