// src/config/fieldConfig.ts
import { ElementKind, FieldName, TrailingAbsences } from "../types";
import { DEFAULT_INNER_DELIMITER } from "../utils/listParser";

/**
 * Wire configuration for one list-valued directions parameter.
 */
export interface FieldConfig {
  /** Field identifier used by callers and the HTTP routes */
  name: FieldName;

  /** Query parameter name on the wire */
  queryParameter: string;

  /** Separator between list positions */
  delimiter: string;

  /** Separator inside one compound element, null for scalar elements */
  innerDelimiter: string | null;

  /** What each present position holds */
  element: ElementKind;

  /** Whether a position may be left empty */
  allowsAbsence: boolean;

  /** Whether a zero-length list is sent as no parameter at all */
  omitWhenEmpty: boolean;

  /** Trailing-absence policy request builders apply by default */
  trailing: TrailingAbsences;
}

/**
 * Field configurations indexed by FieldName.
 */
const FIELD_CONFIGS: Record<FieldName, FieldConfig> = {
  coordinates: {
    name: "coordinates",
    queryParameter: "coordinates",
    delimiter: ";",
    innerDelimiter: ",",
    element: "point",
    allowsAbsence: false,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  bearings: {
    name: "bearings",
    queryParameter: "bearings",
    delimiter: ";",
    innerDelimiter: ",",
    element: "bearing",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  radiuses: {
    name: "radiuses",
    queryParameter: "radiuses",
    delimiter: ";",
    innerDelimiter: null,
    element: "radius",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  approaches: {
    name: "approaches",
    queryParameter: "approaches",
    delimiter: ";",
    innerDelimiter: null,
    element: "approach",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  waypointNames: {
    name: "waypointNames",
    queryParameter: "waypoint_names",
    delimiter: ";",
    innerDelimiter: null,
    element: "text",
    allowsAbsence: true,
    omitWhenEmpty: true,
    trailing: "keep",
  },
  waypointTargets: {
    name: "waypointTargets",
    queryParameter: "waypoint_targets",
    delimiter: ";",
    innerDelimiter: ",",
    element: "point",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  waypointIndices: {
    name: "waypointIndices",
    queryParameter: "waypoints",
    delimiter: ";",
    innerDelimiter: null,
    element: "integer",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  annotations: {
    name: "annotations",
    queryParameter: "annotations",
    delimiter: ",",
    innerDelimiter: null,
    element: "annotation",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  snappingIncludeClosures: {
    name: "snappingIncludeClosures",
    queryParameter: "snapping_include_closures",
    delimiter: ";",
    innerDelimiter: null,
    element: "boolean",
    allowsAbsence: true,
    omitWhenEmpty: false,
    trailing: "keep",
  },
  distributions: {
    name: "distributions",
    queryParameter: "distributions",
    delimiter: ";",
    innerDelimiter: ",",
    element: "numberList",
    allowsAbsence: true,
    omitWhenEmpty: true,
    trailing: "keep",
  },
};

export const FIELD_NAMES = Object.keys(FIELD_CONFIGS).filter(isFieldName);

/**
 * Checks whether a string names a configured field.
 */
export function isFieldName(name: string): name is FieldName {
  return Object.prototype.hasOwnProperty.call(FIELD_CONFIGS, name);
}

/**
 * Gets the configuration for a field.
 */
export function getFieldConfig(field: FieldName): FieldConfig {
  return FIELD_CONFIGS[field];
}

/**
 * Gets the list delimiter for a field.
 */
export function getFieldDelimiter(field: FieldName): string {
  return FIELD_CONFIGS[field].delimiter;
}

/**
 * Gets the compound-element delimiter for a field, falling back to the comma.
 */
export function getInnerDelimiter(field: FieldName): string {
  return FIELD_CONFIGS[field].innerDelimiter ?? DEFAULT_INNER_DELIMITER;
}
