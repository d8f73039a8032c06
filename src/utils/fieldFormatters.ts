// src/utils/fieldFormatters.ts
import type { Bearing, Distribution, FieldName, Point, PositionalInput, TrailingAbsences } from "../types";
import { getFieldConfig, getFieldDelimiter, getInnerDelimiter } from "../config/fieldConfig";
import { isCriteriaValue } from "../config/directionsCriteria";
import { MalformedElementError, ValidationViolationError } from "./errors";
import { formatList, mapPositions } from "./listFormatter";
import { assertDistinctDelimiters } from "./listParser";
import { canonicalNumber } from "./numberFormat";
import { parseNumberToken } from "./parseValidate";

/** Radius literal that lifts the snapping limit for a waypoint. */
export const UNLIMITED_RADIUS = "unlimited";

/** Bearing angles and tolerances are degrees in this closed range. */
export const MIN_BEARING_DEGREES = 0;
export const MAX_BEARING_DEGREES = 360;

/**
 * Overrides for a field's registered wire settings.
 */
export interface FieldFormatOptions {
  /** List delimiter (defaults to the field's) */
  delimiter?: string;
  /** Compound-element delimiter (defaults to the field's, or a comma) */
  innerDelimiter?: string;
  /** Trailing-absence policy (defaults to the field's) */
  trailing?: TrailingAbsences;
}

interface ResolvedFormatOptions {
  delimiter: string;
  innerDelimiter: string;
  trailing: TrailingAbsences;
  omitWhenEmpty: boolean;
}

function resolveOptions(field: FieldName, options: FieldFormatOptions): ResolvedFormatOptions {
  const config = getFieldConfig(field);
  return {
    delimiter: options.delimiter ?? getFieldDelimiter(field),
    innerDelimiter: options.innerDelimiter ?? getInnerDelimiter(field),
    trailing: options.trailing ?? config.trailing,
    omitWhenEmpty: config.omitWhenEmpty,
  };
}

const asToken = (token: string): string => token;

/**
 * Renders a point as `longitude<inner>latitude`.
 */
export function formatPoint(point: Point, innerDelimiter: string = ","): string {
  const [longitude, latitude] = point.coordinates;
  if (longitude === undefined || latitude === undefined) {
    throw new MalformedElementError(
      `Point must have a longitude and a latitude, got ${point.coordinates.length} coordinate(s)`,
    );
  }
  return `${canonicalNumber(longitude)}${innerDelimiter}${canonicalNumber(latitude)}`;
}

// --- Compound fields ---

/**
 * Formats `[angle, tolerance]` pairs. A pair missing either component is
 * sent as an empty position; both components must lie in [0, 360].
 *
 * @example formatBearings([null, [10, 20]]) === ";10,20"
 */
export function formatBearings(
  bearings: PositionalInput<Bearing> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  if (bearings === null || bearings === undefined) {
    return null;
  }
  const { delimiter, innerDelimiter, trailing } = resolveOptions("bearings", options);
  assertDistinctDelimiters(delimiter, innerDelimiter);

  const tokens = mapPositions(bearings, "bearings", (bearing) => {
    if (bearing.length !== 2) {
      throw new MalformedElementError(
        `Bearing must contain exactly an angle and a tolerance, got ${bearing.length} value(s)`,
      );
    }
    const [angle, tolerance] = bearing;
    if (angle === null || angle === undefined || tolerance === null || tolerance === undefined) {
      return null;
    }
    if (!isBearingDegrees(angle) || !isBearingDegrees(tolerance)) {
      throw new ValidationViolationError(
        `Angle and tolerance must be between ${MIN_BEARING_DEGREES} and ${MAX_BEARING_DEGREES}, got ${angle} and ${tolerance}`,
      );
    }
    return `${canonicalNumber(angle)}${innerDelimiter}${canonicalNumber(tolerance)}`;
  });
  return formatList(tokens, delimiter, asToken, trailing);
}

function isBearingDegrees(value: number): boolean {
  return value >= MIN_BEARING_DEGREES && value <= MAX_BEARING_DEGREES;
}

/**
 * Formats per-leg distribution pairs. Values past the second are not sent.
 * An empty list means no parameter; an empty entry is an empty position.
 */
export function formatDistributions(
  distributions: PositionalInput<Distribution> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  if (distributions === null || distributions === undefined) {
    return null;
  }
  const { delimiter, innerDelimiter, trailing, omitWhenEmpty } = resolveOptions("distributions", options);
  if (omitWhenEmpty && distributions.length === 0) {
    return null;
  }
  assertDistinctDelimiters(delimiter, innerDelimiter);

  const tokens = mapPositions(distributions, "distributions", (distribution) => {
    if (distribution.length === 0) return null;
    if (distribution.length < 2) {
      throw new MalformedElementError("Distribution must contain two values");
    }
    return `${canonicalNumber(distribution[0])}${innerDelimiter}${canonicalNumber(distribution[1])}`;
  });
  return formatList(tokens, delimiter, asToken, trailing);
}

/**
 * Formats the full coordinate list. Every entry must be present.
 */
export function formatCoordinates(
  coordinates: ReadonlyArray<Point>,
  options: FieldFormatOptions = {},
): string {
  const { delimiter, innerDelimiter, trailing } = resolveOptions("coordinates", options);
  assertDistinctDelimiters(delimiter, innerDelimiter);
  return formatList(coordinates, delimiter, (point) => formatPoint(point, innerDelimiter), trailing) ?? "";
}

export function formatWaypointTargets(
  targets: PositionalInput<Point> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  const { delimiter, innerDelimiter, trailing } = resolveOptions("waypointTargets", options);
  assertDistinctDelimiters(delimiter, innerDelimiter);
  return formatList(targets, delimiter, (point) => formatPoint(point, innerDelimiter), trailing);
}

// --- Validated text fields ---

/**
 * Approaches pass through unchanged once checked against the approach set.
 */
export function formatApproaches(
  approaches: PositionalInput<string> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  if (approaches === null || approaches === undefined) {
    return null;
  }
  const { delimiter, trailing } = resolveOptions("approaches", options);
  const tokens = mapPositions(approaches, "approaches", (approach) => {
    if (!isCriteriaValue("approach", approach)) {
      throw new ValidationViolationError(
        `Approach should be one of unrestricted or curb, got "${approach}"`,
      );
    }
    return approach;
  });
  return formatList(tokens, delimiter, asToken, trailing);
}

/**
 * Radiuses are sent as given: `unlimited` or a non-negative number of
 * meters. The text is checked but never re-canonicalized.
 */
export function formatRadiuses(
  radiuses: PositionalInput<string> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  if (radiuses === null || radiuses === undefined) {
    return null;
  }
  const { delimiter, trailing } = resolveOptions("radiuses", options);
  const tokens = mapPositions(radiuses, "radiuses", (radius) => {
    if (radius === UNLIMITED_RADIUS) return radius;
    if (parseNumberToken(radius) < 0) {
      throw new ValidationViolationError(
        `Radiuses need to be greater than 0 or "${UNLIMITED_RADIUS}", got "${radius}"`,
      );
    }
    return radius;
  });
  return formatList(tokens, delimiter, asToken, trailing);
}

// --- Plain joins ---

/**
 * An empty name list is treated as no parameter.
 */
export function formatWaypointNames(
  names: PositionalInput<string> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  if (names === null || names === undefined) {
    return null;
  }
  const { delimiter, trailing, omitWhenEmpty } = resolveOptions("waypointNames", options);
  if (omitWhenEmpty && names.length === 0) {
    return null;
  }
  return formatList(names, delimiter, asToken, trailing);
}

export function formatWaypointIndices(
  indices: PositionalInput<number> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  const { delimiter, trailing } = resolveOptions("waypointIndices", options);
  return formatList(indices, delimiter, formatInteger, trailing);
}

export function formatAnnotations(
  annotations: PositionalInput<string> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  const { delimiter, trailing } = resolveOptions("annotations", options);
  return formatList(annotations, delimiter, asToken, trailing);
}

export function formatSnappingIncludeClosures(
  closures: PositionalInput<boolean> | null | undefined,
  options: FieldFormatOptions = {},
): string | null {
  const { delimiter, trailing } = resolveOptions("snappingIncludeClosures", options);
  return formatList(closures, delimiter, (flag) => String(flag), trailing);
}

function formatInteger(value: number): string {
  if (!Number.isSafeInteger(value)) {
    throw new MalformedElementError(`${value} is not an integer`);
  }
  return String(value);
}
