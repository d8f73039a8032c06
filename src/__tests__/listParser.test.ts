import { describe, expect, it } from "vitest";
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
import { MalformedElementError, ValidationViolationError } from "../utils/errors";
import type { Point } from "../types";

const point = (longitude: number, latitude: number): Point => ({
  type: "Point",
  coordinates: [longitude, latitude],
});

describe("parseList", () => {
  it("returns null when the parameter is absent", () => {
    expect(parseList(null, ";", (token) => token)).toBeNull();
    expect(parseList(undefined, ";", (token) => token)).toBeNull();
  });

  it("parses an empty string to a zero-length list", () => {
    expect(parseList("", ";", (token) => token)).toEqual([]);
  });

  it("keeps every empty token as an absent position", () => {
    expect(parseList("a;;b", ";", (token) => token)).toEqual(["a", null, "b"]);
    expect(parseList("a;;;b", ";", (token) => token)).toEqual(["a", null, null, "b"]);
    expect(parseList(";;", ";", (token) => token)).toEqual([null, null, null]);
  });

  it("does not call the element parser for empty tokens", () => {
    const seen: string[] = [];
    parseList(";x;;y;", ";", (token) => {
      seen.push(token);
      return token;
    });
    expect(seen).toEqual(["x", "y"]);
  });

  it("fails the whole call and reports the failing position", () => {
    let caught: unknown;
    try {
      parseIntegers("1;2;x;4");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MalformedElementError);
    expect(caught).toMatchObject({ position: 2 });
  });

  it("rejects multi-character delimiters", () => {
    expect(() => parseList("a;b", ";;", (token) => token)).toThrow(ValidationViolationError);
  });
});

describe("parseStrings", () => {
  it("splits on semicolons by default", () => {
    expect(parseStrings("distance;congestion")).toEqual(["distance", "congestion"]);
  });

  it("splits on a caller-supplied delimiter", () => {
    expect(parseStrings("distance,congestion", ",")).toEqual(["distance", "congestion"]);
  });

  it("preserves leading, inner and trailing absences", () => {
    expect(parseStrings("ab;;;cd;ef;;;gh;ij")).toEqual([
      "ab",
      null,
      null,
      "cd",
      "ef",
      null,
      null,
      "gh",
      "ij",
    ]);
    expect(parseStrings(";distance;congestion")).toEqual([null, "distance", "congestion"]);
    expect(parseStrings(";distance;congestion;")).toEqual([null, "distance", "congestion", null]);
  });
});

describe("parseIntegers", () => {
  it("parses fully present lists", () => {
    expect(parseIntegers("1;4;5;7;8")).toEqual([1, 4, 5, 7, 8]);
  });

  it("parses signed values and absences", () => {
    expect(parseIntegers("-1;;+2")).toEqual([-1, null, 2]);
  });
});

describe("parseNumbers", () => {
  it("parses decimals with absences", () => {
    expect(parseNumbers(";5.1;;7.4;;")).toEqual([null, 5.1, null, 7.4, null, null]);
  });

  it("accepts exponential notation", () => {
    expect(parseNumbers("1e2;2.5E-1")).toEqual([100, 0.25]);
  });
});

describe("parseBooleans", () => {
  it("parses flags with absences", () => {
    expect(parseBooleans(";true;;;false;false;true;;;;")).toEqual([
      null,
      true,
      null,
      null,
      false,
      false,
      true,
      null,
      null,
      null,
      null,
    ]);
  });

  it("returns an empty list for an empty string", () => {
    expect(parseBooleans("")).toEqual([]);
  });

  it("rejects anything but true and false", () => {
    expect(() => parseBooleans("true;TRUE")).toThrow(MalformedElementError);
  });
});

describe("parsePoints", () => {
  it("reads longitude then latitude", () => {
    expect(parsePoints("1.2,3.4;;;5.65,7.123;;;")).toEqual([
      point(1.2, 3.4),
      null,
      null,
      point(5.65, 7.123),
      null,
      null,
      null,
    ]);
  });

  it("rejects points without exactly two coordinates", () => {
    expect(() => parsePoints("1.2")).toThrow(MalformedElementError);
    expect(() => parsePoints("1,2,3")).toThrow(MalformedElementError);
    expect(() => parsePoints("1,")).toThrow(MalformedElementError);
  });

  it("supports a space as inner delimiter when the list uses commas", () => {
    expect(parsePoints("1 2,3 4", ",", " ")).toEqual([point(1, 2), point(3, 4)]);
  });

  it("rejects identical outer and inner delimiters", () => {
    expect(() => parsePoints("1,2", ",", ",")).toThrow(ValidationViolationError);
  });
});

describe("parseNumberLists", () => {
  it("parses nested lists and keeps empty outer positions absent", () => {
    expect(parseNumberLists(";5.1,7.4;;")).toEqual([null, [5.1, 7.4], null, null]);
  });

  it("parses single-value and longer inner lists", () => {
    expect(parseNumberLists("1;2,3,4")).toEqual([[1], [2, 3, 4]]);
  });

  it("rejects empty inner tokens", () => {
    expect(() => parseNumberLists("1,,2")).toThrow(MalformedElementError);
  });
});

describe("parseCriteria", () => {
  it("narrows tokens to a criteria category", () => {
    expect(parseCriteria("distance,congestion", "annotation", ",")).toEqual([
      "distance",
      "congestion",
    ]);
    expect(parseCriteria(";curb;unrestricted", "approach")).toEqual([null, "curb", "unrestricted"]);
  });

  it("rejects unknown values", () => {
    expect(() => parseCriteria("curb;kerb", "approach")).toThrow(MalformedElementError);
  });
});
