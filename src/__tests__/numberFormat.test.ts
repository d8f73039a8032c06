import { describe, expect, it } from "vitest";
import { canonicalNumber } from "../utils/numberFormat";
import { ValidationViolationError } from "../utils/errors";

describe("canonicalNumber", () => {
  it("renders integral values without a decimal point", () => {
    expect(canonicalNumber(5)).toBe("5");
    expect(canonicalNumber(5.0)).toBe("5");
    expect(canonicalNumber(-42)).toBe("-42");
    expect(canonicalNumber(123456789)).toBe("123456789");
  });

  it("strips trailing fractional zeros", () => {
    expect(canonicalNumber(1.5)).toBe("1.5");
    expect(canonicalNumber(0.001)).toBe("0.001");
    expect(canonicalNumber(1234567.891)).toBe("1234567.891");
  });

  it("rounds to six fractional digits", () => {
    expect(canonicalNumber(5.123456789)).toBe("5.123457");
    expect(canonicalNumber(-73.98765432)).toBe("-73.987654");
    expect(canonicalNumber(0.1 + 0.2)).toBe("0.3");
  });

  it("resolves exact ties to the even neighbour", () => {
    // 1/128, 3/128 and 5/128 end in a 5 at the seventh fractional digit
    expect(canonicalNumber(0.0078125)).toBe("0.007812");
    expect(canonicalNumber(0.0234375)).toBe("0.023438");
    expect(canonicalNumber(0.0390625)).toBe("0.039062");
    expect(canonicalNumber(-0.0078125)).toBe("-0.007812");
  });

  it("never emits a signed zero", () => {
    expect(canonicalNumber(-0)).toBe("0");
    expect(canonicalNumber(-0.0000001)).toBe("0");
    expect(canonicalNumber(0.0000001)).toBe("0");
  });

  it("never emits exponential notation", () => {
    expect(canonicalNumber(1e21)).toBe("1000000000000000000000");
    expect(canonicalNumber(-1e21)).toBe("-1000000000000000000000");
    expect(canonicalNumber(1e-5)).toBe("0.00001");
  });

  it("rejects non-finite numbers", () => {
    expect(() => canonicalNumber(Number.NaN)).toThrow(ValidationViolationError);
    expect(() => canonicalNumber(Number.POSITIVE_INFINITY)).toThrow(ValidationViolationError);
    expect(() => canonicalNumber(Number.NEGATIVE_INFINITY)).toThrow(ValidationViolationError);
  });
});
