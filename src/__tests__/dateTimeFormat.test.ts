import { describe, expect, it } from "vitest";
import { formatDateTime, parseDateTime } from "../utils/dateTimeFormat";
import { MalformedElementError, ValidationViolationError } from "../utils/errors";

describe("formatDateTime", () => {
  it("renders local time with minute precision", () => {
    expect(formatDateTime(new Date(2024, 0, 15, 10, 5, 42))).toBe("2024-01-15T10:05");
  });

  it("passes absence through", () => {
    expect(formatDateTime(null)).toBeNull();
  });

  it("rejects invalid dates", () => {
    expect(() => formatDateTime(new Date(Number.NaN))).toThrow(ValidationViolationError);
  });
});

describe("parseDateTime", () => {
  it("reads the value as local time", () => {
    const parsed = parseDateTime("2024-03-09T07:45");
    expect(parsed?.getFullYear()).toBe(2024);
    expect(parsed?.getMonth()).toBe(2);
    expect(parsed?.getDate()).toBe(9);
    expect(parsed?.getHours()).toBe(7);
    expect(parsed?.getMinutes()).toBe(45);
  });

  it("formats back to the same text", () => {
    expect(formatDateTime(parseDateTime("2023-12-31T23:59"))).toBe("2023-12-31T23:59");
  });

  it("passes absence through", () => {
    expect(parseDateTime(undefined)).toBeNull();
  });

  it.each(["2024-1-15T10:05", "2024-01-15 10:05", "2024-01-15T10:05:00", "2024-13-01T10:00", "2023-02-29T10:00"])(
    "rejects %j",
    (input) => {
      expect(() => parseDateTime(input)).toThrow(MalformedElementError);
    },
  );
});
