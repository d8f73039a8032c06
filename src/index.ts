// src/index.ts
export type {
  Bearing,
  Distribution,
  ElementKind,
  ElementParser,
  FieldName,
  Optional,
  Point,
  PositionalInput,
  PositionalList,
  TokenFormatter,
  TrailingAbsences,
} from "./types";

export {
  CodecError,
  MalformedElementError,
  ValidationViolationError,
} from "./utils/errors";

export { canonicalNumber, MAX_FRACTION_DIGITS } from "./utils/numberFormat";

export {
  DEFAULT_DELIMITER,
  DEFAULT_INNER_DELIMITER,
  criteriaParser,
  numberListParser,
  parseBooleans,
  parseCriteria,
  parseIntegers,
  parseList,
  parseNumberLists,
  parseNumbers,
  parsePoints,
  parseStrings,
  pointParser,
} from "./utils/listParser";

export { parseBooleanToken, parseIntegerToken, parseNumberToken } from "./utils/parseValidate";

export { formatList } from "./utils/listFormatter";

export {
  MAX_BEARING_DEGREES,
  MIN_BEARING_DEGREES,
  UNLIMITED_RADIUS,
  formatAnnotations,
  formatApproaches,
  formatBearings,
  formatCoordinates,
  formatDistributions,
  formatPoint,
  formatRadiuses,
  formatSnappingIncludeClosures,
  formatWaypointIndices,
  formatWaypointNames,
  formatWaypointTargets,
} from "./utils/fieldFormatters";
export type { FieldFormatOptions } from "./utils/fieldFormatters";

export { ISO_8601_PATTERN, formatDateTime, parseDateTime } from "./utils/dateTimeFormat";

export * from "./config/directionsCriteria";
export {
  FIELD_NAMES,
  getFieldConfig,
  getFieldDelimiter,
  getInnerDelimiter,
  isFieldName,
} from "./config/fieldConfig";
export type { FieldConfig } from "./config/fieldConfig";
