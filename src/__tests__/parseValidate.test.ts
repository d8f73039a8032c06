import { describe, expect, it } from "vitest";
import {
  parseBooleanToken,
  parseIntegerToken,
  parseNumberToken,
  safeParseInt,
} from "../utils/parseValidate";
import { MalformedElementError } from "../utils/errors";

describe("safeParseInt", () => {
  it("falls back to the default for missing, invalid or out-of-range input", () => {
    expect(safeParseInt(undefined, { defaultValue: 3000 })).toBe(3000);
    expect(safeParseInt("abc", { defaultValue: 7 })).toBe(7);
    expect(safeParseInt("70000", { max: 65535, defaultValue: 3000 })).toBe(3000);
    expect(safeParseInt("8080", { min: 0, max: 65535 })).toBe(8080);
    expect(safeParseInt(null)).toBeNull();
  });
});

describe("parseIntegerToken", () => {
  it("accepts signed base-10 integers", () => {
    expect(parseIntegerToken("42")).toBe(42);
    expect(parseIntegerToken("-3")).toBe(-3);
    expect(parseIntegerToken("+8")).toBe(8);
    expect(parseIntegerToken("007")).toBe(7);
  });

  it.each(["1.5", "1,000", " 1", "1e3", "0x10", "", "-"])("rejects %j", (token) => {
    expect(() => parseIntegerToken(token)).toThrow(MalformedElementError);
  });

  it("rejects integers outside the safe range", () => {
    expect(() => parseIntegerToken("9007199254740993")).toThrow(MalformedElementError);
  });
});

describe("parseNumberToken", () => {
  it("accepts plain and exponential forms", () => {
    expect(parseNumberToken("5.1")).toBe(5.1);
    expect(parseNumberToken("-12.5")).toBe(-12.5);
    expect(parseNumberToken(".5")).toBe(0.5);
    expect(parseNumberToken("3.")).toBe(3);
    expect(parseNumberToken("1e-3")).toBe(0.001);
    expect(parseNumberToken("2.5E2")).toBe(250);
  });

  it.each(["NaN", "Infinity", "0x1A", "1,5", " 2", "abc", "1e", "."])("rejects %j", (token) => {
    expect(() => parseNumberToken(token)).toThrow(MalformedElementError);
  });

  it("rejects values that overflow to infinity", () => {
    expect(() => parseNumberToken("1e400")).toThrow(MalformedElementError);
  });
});

describe("parseBooleanToken", () => {
  it("is case-sensitive", () => {
    expect(parseBooleanToken("true")).toBe(true);
    expect(parseBooleanToken("false")).toBe(false);
    expect(() => parseBooleanToken("True")).toThrow(MalformedElementError);
    expect(() => parseBooleanToken("1")).toThrow(MalformedElementError);
  });
});
