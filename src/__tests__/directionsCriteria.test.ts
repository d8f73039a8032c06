import { describe, expect, it } from "vitest";
import {
  assertCriteriaValue,
  CRITERIA_CATEGORIES,
  getCriteriaValues,
  isCriteriaValue,
  isTrafficTendency,
} from "../config/directionsCriteria";
import { ValidationViolationError } from "../utils/errors";

describe("directions criteria", () => {
  it("exposes every category", () => {
    expect(CRITERIA_CATEGORIES).toEqual([
      "profile",
      "geometry",
      "overview",
      "annotation",
      "exclude",
      "include",
      "voiceUnits",
      "source",
      "destination",
      "approach",
      "paymentMethod",
      "amenityType",
    ]);
  });

  it("matches values exactly", () => {
    expect(isCriteriaValue("profile", "driving-traffic")).toBe(true);
    expect(isCriteriaValue("profile", "Driving")).toBe(false);
    expect(isCriteriaValue("amenityType", "ATM")).toBe(true);
    expect(isCriteriaValue("amenityType", "atm")).toBe(false);
  });

  it("does not leak values across categories", () => {
    expect(isCriteriaValue("source", "last")).toBe(false);
    expect(isCriteriaValue("destination", "last")).toBe(true);
  });

  it("lists the accepted values of a category", () => {
    expect(getCriteriaValues("approach")).toEqual(["unrestricted", "curb"]);
    expect(getCriteriaValues("geometry")).toEqual(["polyline", "polyline6"]);
  });

  it("asserts membership", () => {
    expect(assertCriteriaValue("overview", "full")).toBe("full");
    expect(() => assertCriteriaValue("overview", "none")).toThrow(ValidationViolationError);
    expect(() => assertCriteriaValue("exclude", "highway")).toThrow(
      'Must be one of: toll, motorway, ferry, tunnel, restricted, cash_only_tolls, unpaved',
    );
  });

  it("recognizes traffic tendency codes", () => {
    expect(isTrafficTendency(0)).toBe(true);
    expect(isTrafficTendency(5)).toBe(true);
    expect(isTrafficTendency(6)).toBe(false);
  });
});
