/**
 * Message templating for bar labels.
 *
 * Messages are a template plus an explicit list of substitution values:
 *
 * ```typescript
 * formatMessage("Processing %d files in %s", [12, "src"]);
 * // "Processing 12 files in src"
 * ```
 *
 * @module progress/message
 */

import { MessageFormatError } from "./errors.js";

export type MessageValue = string | number | boolean | bigint;

const PLACEHOLDER = /%(%|s|d|i|f|\.(\d+)f)/g;

function substitute(conversion: string, precision: string | undefined, value: MessageValue): string {
  switch (conversion) {
    case "s":
      return String(value);
    case "d":
    case "i":
      return typeof value === "bigint" ? value.toString() : String(Math.trunc(Number(value)));
    case "f":
      return String(Number(value));
    default:
      return Number(value).toFixed(Number(precision));
  }
}

/**
 * Count the value placeholders in a template (`%%` is a literal percent).
 */
export function countPlaceholders(template: string): number {
  let count = 0;
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1] !== "%") count++;
  }
  return count;
}

/**
 * Substitute values into a template.
 *
 * Supports `%s`, `%d`, `%i`, `%f`, `%.Nf` and `%%`.
 *
 * @throws MessageFormatError when the placeholder count differs from `values.length`
 */
export function formatMessage(template: string, values: readonly MessageValue[] = []): string {
  const expected = countPlaceholders(template);
  if (expected !== values.length) {
    throw new MessageFormatError(template, expected, values.length);
  }

  let next = 0;
  return template.replace(PLACEHOLDER, (_match, conversion: string, precision: string | undefined) => {
    if (conversion === "%") return "%";
    const value = values[next++];
    return value === undefined ? "" : substitute(conversion, precision, value);
  });
}
