// src/config/directionsCriteria.ts
import { ValidationViolationError } from "../utils/errors";

// *** Closed value sets accepted by the directions API, one per category ***

export const PROFILES = ["driving-traffic", "driving", "walking", "cycling"] as const;

export const GEOMETRIES = ["polyline", "polyline6"] as const;

export const OVERVIEWS = ["simplified", "full", "false"] as const;

export const ANNOTATIONS = [
  "duration",
  "distance",
  "speed",
  "congestion",
  "congestion_numeric",
  "maxspeed",
  "closure",
  "traffic_tendency",
] as const;

export const EXCLUDES = [
  "toll",
  "motorway",
  "ferry",
  "tunnel",
  "restricted",
  "cash_only_tolls",
  "unpaved",
] as const;

export const INCLUDES = ["hov2", "hov3", "hot"] as const;

export const VOICE_UNITS = ["imperial", "metric"] as const;

export const SOURCES = ["any", "first"] as const;

export const DESTINATIONS = ["any", "last"] as const;

export const APPROACHES = ["unrestricted", "curb"] as const;

export const PAYMENT_METHODS = [
  "general",
  "etc",
  "etcx",
  "cash",
  "exact_cash",
  "coins",
  "notes",
  "debit_cards",
  "pass_card",
  "credit_cards",
  "video",
  "cryptocurrencies",
  "app",
] as const;

export const AMENITY_TYPES = [
  "gas_station",
  "electric_charging_station",
  "toilet",
  "coffee",
  "restaurant",
  "snack",
  "ATM",
  "info",
  "baby_care",
  "facilities_for_disabled",
  "shop",
  "telephone",
  "hotel",
  "hotspring",
  "shower",
  "picnic_shelter",
  "post",
  "FAX",
] as const;

/** Congestion trend codes reported per segment (0 = unknown). */
export const TRAFFIC_TENDENCIES = {
  UNKNOWN: 0,
  CONSTANT_CONGESTION: 1,
  INCREASING_CONGESTION: 2,
  DECREASING_CONGESTION: 3,
  RAPIDLY_INCREASING_CONGESTION: 4,
  RAPIDLY_DECREASING_CONGESTION: 5,
} as const;

export type Profile = (typeof PROFILES)[number];
export type Geometry = (typeof GEOMETRIES)[number];
export type Overview = (typeof OVERVIEWS)[number];
export type Annotation = (typeof ANNOTATIONS)[number];
export type ExcludeValue = (typeof EXCLUDES)[number];
export type IncludeValue = (typeof INCLUDES)[number];
export type VoiceUnits = (typeof VOICE_UNITS)[number];
export type Source = (typeof SOURCES)[number];
export type Destination = (typeof DESTINATIONS)[number];
export type Approach = (typeof APPROACHES)[number];
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];
export type AmenityType = (typeof AMENITY_TYPES)[number];
export type TrafficTendency = (typeof TRAFFIC_TENDENCIES)[keyof typeof TRAFFIC_TENDENCIES];

/**
 * String-valued categories indexed by name.
 */
const CRITERIA = {
  profile: PROFILES,
  geometry: GEOMETRIES,
  overview: OVERVIEWS,
  annotation: ANNOTATIONS,
  exclude: EXCLUDES,
  include: INCLUDES,
  voiceUnits: VOICE_UNITS,
  source: SOURCES,
  destination: DESTINATIONS,
  approach: APPROACHES,
  paymentMethod: PAYMENT_METHODS,
  amenityType: AMENITY_TYPES,
} as const;

export type CriteriaCategory = keyof typeof CRITERIA;
export type CriteriaValue<C extends CriteriaCategory> = (typeof CRITERIA)[C][number];

export const CRITERIA_CATEGORIES = Object.keys(CRITERIA).filter(isCriteriaCategory);

function isCriteriaCategory(name: string): name is CriteriaCategory {
  return Object.prototype.hasOwnProperty.call(CRITERIA, name);
}

/**
 * Lists the accepted values for a category.
 */
export function getCriteriaValues<C extends CriteriaCategory>(
  category: C,
): (typeof CRITERIA)[C] {
  return CRITERIA[category];
}

/**
 * Checks membership in a category. Comparison is exact (case-sensitive).
 */
export function isCriteriaValue<C extends CriteriaCategory>(
  category: C,
  value: string,
): value is CriteriaValue<C> {
  const allowed: ReadonlyArray<string> = CRITERIA[category];
  return allowed.includes(value);
}

/**
 * Narrows `value` to a member of `category` or throws.
 */
export function assertCriteriaValue<C extends CriteriaCategory>(
  category: C,
  value: string,
): CriteriaValue<C> {
  if (!isCriteriaValue(category, value)) {
    throw new ValidationViolationError(
      `"${value}" is not a valid ${category}. Must be one of: ${CRITERIA[category].join(", ")}`,
    );
  }
  return value;
}

export function isTrafficTendency(value: number): value is TrafficTendency {
  const codes: ReadonlyArray<number> = Object.values(TRAFFIC_TENDENCIES);
  return codes.includes(value);
}
