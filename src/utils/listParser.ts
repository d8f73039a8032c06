// src/utils/listParser.ts
import type { ElementParser, Point, PositionalList } from "../types";
import {
  CriteriaCategory,
  CriteriaValue,
  isCriteriaValue,
} from "../config/directionsCriteria";
import { atPosition, MalformedElementError, ValidationViolationError } from "./errors";
import { parseBooleanToken, parseIntegerToken, parseNumberToken } from "./parseValidate";

/** Separates list positions unless a field says otherwise. */
export const DEFAULT_DELIMITER = ";";

/** Separates the components of one compound element (points, bearings, distributions). */
export const DEFAULT_INNER_DELIMITER = ",";

/**
 * Delimiters are single characters.
 */
export function assertDelimiter(delimiter: string): void {
  if (delimiter.length !== 1) {
    throw new ValidationViolationError(
      `Delimiter must be a single character, got "${delimiter}"`,
    );
  }
}

/**
 * Compound elements cannot be split back apart if both levels share a delimiter.
 */
export function assertDistinctDelimiters(delimiter: string, innerDelimiter: string): void {
  assertDelimiter(delimiter);
  assertDelimiter(innerDelimiter);
  if (delimiter === innerDelimiter) {
    throw new ValidationViolationError(
      `Inner delimiter "${innerDelimiter}" must differ from the list delimiter`,
    );
  }
}

/**
 * Splits a list parameter into positions and converts each non-empty token
 * with `elementParser`.
 *
 * - `null`/`undefined` input means the parameter was not supplied: returns `null`.
 * - `""` is a supplied-but-empty list: returns `[]`, not `[null]`.
 * - Every empty token (leading, trailing or between two delimiters) becomes `null`.
 *
 * The first token that fails to parse aborts the whole call; the thrown
 * error carries that token's position.
 */
export function parseList<T>(
  input: string | null | undefined,
  delimiter: string,
  elementParser: ElementParser<T>,
): PositionalList<T> | null {
  if (input === null || input === undefined) {
    return null;
  }
  assertDelimiter(delimiter);
  if (input === "") {
    return [];
  }

  return input.split(delimiter).map((token, position) => {
    if (token === "") return null;
    try {
      return elementParser(token);
    } catch (error) {
      throw atPosition(error, position);
    }
  });
}

// --- Element parsers for compound tokens ---

/**
 * Builds a parser for `longitude<inner>latitude` tokens.
 */
export function pointParser(innerDelimiter: string = DEFAULT_INNER_DELIMITER): ElementParser<Point> {
  return (token) => {
    const parts = token.split(innerDelimiter);
    if (parts.length !== 2) {
      throw new MalformedElementError(
        `"${token}" must contain exactly two coordinates separated by "${innerDelimiter}", found ${parts.length}`,
      );
    }
    return {
      type: "Point",
      coordinates: [parseNumberToken(parts[0]), parseNumberToken(parts[1])],
    };
  };
}

export function numberListParser(
  innerDelimiter: string = DEFAULT_INNER_DELIMITER,
): ElementParser<number[]> {
  return (token) => token.split(innerDelimiter).map(parseNumberToken);
}

/**
 * Builds a parser that only lets through members of a criteria category.
 */
export function criteriaParser<C extends CriteriaCategory>(category: C): ElementParser<CriteriaValue<C>> {
  return (token) => {
    if (!isCriteriaValue(category, token)) {
      throw new MalformedElementError(`"${token}" is not a known ${category}`);
    }
    return token;
  };
}

// --- Specializations ---

export function parseIntegers(
  input: string | null | undefined,
  delimiter: string = DEFAULT_DELIMITER,
): PositionalList<number> | null {
  return parseList(input, delimiter, parseIntegerToken);
}

export function parseNumbers(
  input: string | null | undefined,
  delimiter: string = DEFAULT_DELIMITER,
): PositionalList<number> | null {
  return parseList(input, delimiter, parseNumberToken);
}

/**
 * Tokens are kept verbatim. Map the result afterwards to turn them into
 * domain values.
 */
export function parseStrings(
  input: string | null | undefined,
  delimiter: string = DEFAULT_DELIMITER,
): PositionalList<string> | null {
  return parseList(input, delimiter, (token) => token);
}

export function parseBooleans(
  input: string | null | undefined,
  delimiter: string = DEFAULT_DELIMITER,
): PositionalList<boolean> | null {
  return parseList(input, delimiter, parseBooleanToken);
}

/**
 * Parses `lng,lat;lng,lat;...` into GeoJSON points.
 *
 * @example parsePoints("1.2,3.4;;5.65,7.123") // [Point(1.2, 3.4), null, Point(5.65, 7.123)]
 */
export function parsePoints(
  input: string | null | undefined,
  delimiter: string = DEFAULT_DELIMITER,
  innerDelimiter: string = DEFAULT_INNER_DELIMITER,
): PositionalList<Point> | null {
  assertDistinctDelimiters(delimiter, innerDelimiter);
  return parseList(input, delimiter, pointParser(innerDelimiter));
}

/**
 * Parses nested number lists such as `;5.1,7.4;;`. An empty outer token is
 * absent before any inner split is attempted.
 */
export function parseNumberLists(
  input: string | null | undefined,
  delimiter: string = DEFAULT_DELIMITER,
  innerDelimiter: string = DEFAULT_INNER_DELIMITER,
): PositionalList<number[]> | null {
  assertDistinctDelimiters(delimiter, innerDelimiter);
  return parseList(input, delimiter, numberListParser(innerDelimiter));
}

/**
 * Parses a text list whose present tokens must belong to `category`, e.g.
 * `parseCriteria("distance,congestion", "annotation", ",")`.
 */
export function parseCriteria<C extends CriteriaCategory>(
  input: string | null | undefined,
  category: C,
  delimiter: string = DEFAULT_DELIMITER,
): PositionalList<CriteriaValue<C>> | null {
  return parseList(input, delimiter, criteriaParser(category));
}
