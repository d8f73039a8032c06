// src/services/codecService.ts
import type { FieldName, Optional, Point, PositionalList, TrailingAbsences } from "../types";
import { getFieldConfig, getInnerDelimiter } from "../config/fieldConfig";
import { CodecError, MalformedElementError, ValidationViolationError } from "../utils/errors";
import {
  formatAnnotations,
  formatApproaches,
  formatBearings,
  formatCoordinates,
  formatDistributions,
  formatRadiuses,
  formatSnappingIncludeClosures,
  formatWaypointIndices,
  formatWaypointNames,
  formatWaypointTargets,
  UNLIMITED_RADIUS,
} from "../utils/fieldFormatters";
import {
  parseBooleans,
  parseCriteria,
  parseIntegers,
  parseList,
  parseNumberLists,
  parseNumbers,
  parsePoints,
  parseStrings,
} from "../utils/listParser";
import { createServiceLogger } from "../utils/logger";
import { canonicalNumber } from "../utils/numberFormat";
import { parseNumberToken } from "../utils/parseValidate";

const logger = createServiceLogger("Codec Service");

/** Any value a field position can decode to. */
export type FieldValue = number | string | boolean | Point | number[];

// --- Parsing ---

/**
 * Decodes a raw query parameter value for `field` using the field's
 * registered delimiters and element type.
 *
 * @returns `null` when `input` is absent, otherwise one entry per position
 * @throws CodecError when a token is malformed or a field rule is broken
 */
export function parseField(
  field: FieldName,
  input: string | null | undefined,
): PositionalList<FieldValue> | null {
  try {
    const values = decode(field, input);
    if (values !== null) {
      ensureNoAbsence(field, values);
      logger.debug(`Parsed ${field}: ${values.length} position(s)`);
    }
    return values;
  } catch (error: unknown) {
    throw report("parse", field, error);
  }
}

function decode(field: FieldName, input: string | null | undefined): PositionalList<FieldValue> | null {
  const config = getFieldConfig(field);
  const { delimiter } = config;
  const innerDelimiter = getInnerDelimiter(field);

  switch (config.element) {
    case "integer":
      return parseIntegers(input, delimiter);
    case "number":
      return parseNumbers(input, delimiter);
    case "text":
      return parseStrings(input, delimiter);
    case "boolean":
      return parseBooleans(input, delimiter);
    case "point":
      return parsePoints(input, delimiter, innerDelimiter);
    case "numberList":
    case "bearing":
      return parseNumberLists(input, delimiter, innerDelimiter);
    case "approach":
      return parseCriteria(input, "approach", delimiter);
    case "annotation":
      return parseCriteria(input, "annotation", delimiter);
    case "radius":
      return parseList(input, delimiter, parseRadiusToken);
    default: {
      const unreachable: never = config.element;
      throw new Error(`Unhandled element kind: ${String(unreachable)}`);
    }
  }
}

function parseRadiusToken(token: string): string {
  if (token === UNLIMITED_RADIUS) return token;
  if (parseNumberToken(token) < 0) {
    throw new ValidationViolationError(`Radius "${token}" is negative`);
  }
  return token;
}

function ensureNoAbsence<T>(field: FieldName, values: PositionalList<T>): void {
  if (getFieldConfig(field).allowsAbsence) return;
  const position = values.findIndex((value) => value === null);
  if (position !== -1) {
    throw new ValidationViolationError(`${field} cannot contain empty positions`, {
      position,
      field,
    });
  }
}

// --- Formatting ---

/**
 * Encodes JSON-shaped values (as received over HTTP) for `field`.
 * Shapes are checked before the field formatter runs its own rules.
 *
 * @param values - array of positions, or null for "parameter not sent"
 * @param trailing - overrides the field's trailing-absence policy
 */
export function formatField(
  field: FieldName,
  values: unknown,
  trailing?: TrailingAbsences,
): string | null {
  try {
    const formatted = encode(field, values, { trailing });
    logger.debug(`Formatted ${field}: ${formatted === null ? "(omitted)" : `"${formatted}"`}`);
    return formatted;
  } catch (error: unknown) {
    throw report("format", field, error);
  }
}

function encode(
  field: FieldName,
  values: unknown,
  options: { trailing?: TrailingAbsences },
): string | null {
  if (values === null || values === undefined) {
    return null;
  }
  if (!Array.isArray(values)) {
    throw new MalformedElementError(`${field} must be an array of positions`, { field });
  }

  switch (field) {
    case "coordinates":
      return formatCoordinates(requirePresent(field, readPositions(field, values, toPoint)), options);
    case "waypointTargets":
      return formatWaypointTargets(readPositions(field, values, toPoint), options);
    case "bearings":
      return formatBearings(readPositions(field, values, toBearing), options);
    case "distributions":
      return formatDistributions(readPositions(field, values, toNumberArray), options);
    case "radiuses":
      return formatRadiuses(readPositions(field, values, toRadius), options);
    case "approaches":
      return formatApproaches(readPositions(field, values, toText), options);
    case "waypointNames":
      return formatWaypointNames(readPositions(field, values, toText), options);
    case "annotations":
      return formatAnnotations(readPositions(field, values, toText), options);
    case "waypointIndices":
      return formatWaypointIndices(readPositions(field, values, toNumber), options);
    case "snappingIncludeClosures":
      return formatSnappingIncludeClosures(readPositions(field, values, toBoolean), options);
    default: {
      const unreachable: never = field;
      throw new Error(`Unhandled field: ${String(unreachable)}`);
    }
  }
}

// --- JSON shape readers ---

/** Returns the typed value, or undefined when the JSON value has the wrong shape. */
type ShapeReader<T> = (value: unknown) => T | undefined;

function readPositions<T>(field: FieldName, values: unknown[], read: ShapeReader<T>): PositionalList<T> {
  return values.map((value, position) => {
    if (value === null) return null;
    const typed = read(value);
    if (typed === undefined) {
      throw new MalformedElementError(`Unexpected value ${JSON.stringify(value)}`, {
        position,
        field,
      });
    }
    return typed;
  });
}

function requirePresent<T>(field: FieldName, values: PositionalList<T>): T[] {
  ensureNoAbsence(field, values);
  return values.filter((value): value is T => value !== null);
}

const toNumber: ShapeReader<number> = (value) => (typeof value === "number" ? value : undefined);

const toText: ShapeReader<string> = (value) => (typeof value === "string" ? value : undefined);

const toBoolean: ShapeReader<boolean> = (value) => (typeof value === "boolean" ? value : undefined);

// Radiuses may arrive as JSON numbers; they are sent in their canonical text form.
// Negative numbers keep their sign so the radius check still rejects them.
const toRadius: ShapeReader<string> = (value) => {
  if (typeof value === "string") return value;
  if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
  return value < 0 ? String(value) : canonicalNumber(value);
};

const toNumberArray: ShapeReader<number[]> = (value) => {
  if (!Array.isArray(value)) return undefined;
  const numbers: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number") return undefined;
    numbers.push(entry);
  }
  return numbers;
};

const toBearing: ShapeReader<Optional<number>[]> = (value) => {
  if (!Array.isArray(value)) return undefined;
  const components: Optional<number>[] = [];
  for (const entry of value) {
    if (entry !== null && typeof entry !== "number") return undefined;
    components.push(entry);
  }
  return components;
};

/** Accepts a GeoJSON Point or a bare `[longitude, latitude]` pair. */
const toPoint: ShapeReader<Point> = (value) => {
  const pair = isRecord(value) && value.type === "Point" ? value.coordinates : value;
  const coordinates = toNumberArray(pair);
  if (coordinates === undefined || coordinates.length !== 2) return undefined;
  return { type: "Point", coordinates };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// --- Error reporting ---

function report(operation: "parse" | "format", field: FieldName, error: unknown): unknown {
  if (error instanceof CodecError) {
    logger.warn(`Rejected ${operation} of ${field}: ${error.toString()}`);
    if (error.field === undefined) {
      return retag(error, field);
    }
    return error;
  }
  logger.error(`Unexpected failure during ${operation} of ${field}`, { error });
  return error;
}

function retag(error: CodecError, field: FieldName): CodecError {
  const options = { position: error.position, field, cause: error };
  if (error instanceof MalformedElementError) return new MalformedElementError(error.message, options);
  if (error instanceof ValidationViolationError) return new ValidationViolationError(error.message, options);
  return new CodecError(error.message, options);
}
