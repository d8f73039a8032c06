// src/types/index.ts
import type { Point } from "geojson";

// --- Positional Values ---

/**
 * One position of a list-valued parameter: a present value, or `null` when
 * the position was deliberately left empty on the wire.
 */
export type Optional<T> = T | null;

/** Ordered, position-preserving values of a list parameter. Wire order = array order. */
export type PositionalList<T> = Optional<T>[];

/** Read-only view accepted by formatters, so callers may pass frozen or `as const` data. */
export type PositionalInput<T> = ReadonlyArray<Optional<T>>;

/** Converts one non-empty wire token into a typed value. Throws on malformed input. */
export type ElementParser<T> = (token: string) => T;

/** Renders one present value as its wire token. */
export type TokenFormatter<T> = (value: T) => string;

/** Whether trailing absent positions are written out or collapsed. */
export type TrailingAbsences = "keep" | "trim";

// --- Element Types ---

export type { Point };

/** Bearing entry as supplied by callers: [angle, tolerance], either of which may be unknown. */
export type Bearing = ReadonlyArray<Optional<number>>;

/** Per-leg distribution entry; only the first two values reach the wire. */
export type Distribution = ReadonlyArray<number>;

/** Element kinds a field can carry. Drives parse/format dispatch in the service layer. */
export type ElementKind =
  | "integer"
  | "number"
  | "text"
  | "point"
  | "boolean"
  | "numberList"
  | "bearing"
  | "approach"
  | "radius"
  | "annotation";

// --- Fields ---

export type FieldName =
  | "coordinates"
  | "bearings"
  | "radiuses"
  | "approaches"
  | "waypointNames"
  | "waypointTargets"
  | "waypointIndices"
  | "annotations"
  | "snappingIncludeClosures"
  | "distributions";
