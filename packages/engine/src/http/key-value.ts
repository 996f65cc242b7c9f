import { ParsingError } from "./errors.js";

/**
 * Split `line` on the first `delimiter` and trim both halves.
 *
 * `"Host: a:b"` with `":"` gives `["Host", "a:b"]`.
 */
export function splitKeyValue(
  line: string,
  delimiter: string,
): [key: string, value: string] {
  const index = line.indexOf(delimiter);
  if (index === -1) {
    throw new ParsingError(
      "MISSING_DELIMITER",
      `Missing "${delimiter}" in "${line}"`,
    );
  }
  return [
    line.substring(0, index).trim(),
    line.substring(index + delimiter.length).trim(),
  ];
}
