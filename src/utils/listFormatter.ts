// src/utils/listFormatter.ts
import type { Optional, PositionalInput, PositionalList, TokenFormatter, TrailingAbsences } from "../types";
import { atPosition, MalformedElementError } from "./errors";
import { assertDelimiter } from "./listParser";

/**
 * Joins positional values into one parameter value.
 *
 * Absent positions render as empty tokens. With `"trim"`, positions after
 * the last present one are dropped entirely, so `[1, null, null]` becomes
 * `"1"` and a list with nothing present becomes `""`. A `null` list stays
 * `null` (parameter not sent).
 *
 * A present value must render to a non-empty token free of `delimiter`,
 * otherwise it would read back as an absence or as several positions.
 */
export function formatList<T>(
  values: PositionalInput<T> | null | undefined,
  delimiter: string,
  toToken: TokenFormatter<T>,
  trailing: TrailingAbsences,
): string | null {
  if (values === null || values === undefined) {
    return null;
  }
  assertDelimiter(delimiter);

  let end = values.length;
  if (trailing === "trim") {
    while (end > 0 && isAbsent(values[end - 1])) {
      end--;
    }
  }

  const tokens: string[] = [];
  for (let position = 0; position < end; position++) {
    const value = values[position];
    if (isAbsent(value)) {
      tokens.push("");
      continue;
    }
    try {
      tokens.push(checkedToken(toToken(value), delimiter));
    } catch (error) {
      throw atPosition(error, position);
    }
  }
  return tokens.join(delimiter);
}

/**
 * Maps every present position through `convert`, keeping absences in place.
 * `convert` may itself return `null` to turn a position absent. Errors
 * thrown by `convert` are re-thrown tagged with the position and field.
 */
export function mapPositions<T, U>(
  values: PositionalInput<T>,
  field: string,
  convert: (value: T) => Optional<U>,
): PositionalList<U> {
  return values.map((value, position) => {
    if (isAbsent(value)) return null;
    try {
      return convert(value);
    } catch (error) {
      throw atPosition(error, position, field);
    }
  });
}

function checkedToken(token: string, delimiter: string): string {
  if (token === "") {
    throw new MalformedElementError("A present value cannot render as an empty token");
  }
  if (token.includes(delimiter)) {
    throw new MalformedElementError(`"${token}" contains the list delimiter "${delimiter}"`);
  }
  return token;
}

function isAbsent<T>(value: Optional<T> | undefined): value is null | undefined {
  return value === null || value === undefined;
}
