/**
 * Handlebars helpers available to every site template
 */

import type Handlebars from "handlebars";
import { format } from "date-fns";
import { UTCDate } from "@date-fns/utc";
import { parsePostDate } from "../utils/post-date";

export const DEFAULT_DATE_FORMAT = "EEE MMM d HH:mm:ss yyyy";
export const DEFAULT_JOIN_SEPARATOR = ", ";

/**
 * Helpers receive Handlebars' options object as their last argument;
 * return the positional arguments that precede it
 */
function positional(args: unknown[]): unknown[] {
  return args.slice(0, -1);
}

/**
 * Format an ISO-8601 date string with a date-fns pattern, in UTC
 *
 * Usage: {{formatDateTime date "EEEE, MMMM d, yyyy"}}
 */
export function formatDateTime(...args: unknown[]): string {
  const [value, pattern] = positional(args);

  if (typeof value !== "string") {
    throw new Error("Property cannot be converted to string.");
  }

  const date = parsePostDate(value);
  if (date === undefined) {
    throw new Error(`Could not parse as datetime: ${value}`);
  }

  return format(
    new UTCDate(date.getTime()),
    typeof pattern === "string" ? pattern : DEFAULT_DATE_FORMAT,
  );
}

/**
 * Join the string elements of an array
 *
 * Usage: {{join tags " + "}}
 */
export function join(...args: unknown[]): string {
  const [value, separator] = positional(args);

  if (!Array.isArray(value)) {
    throw new Error("Property cannot be converted to array.");
  }

  return value
    .filter((item): item is string => typeof item === "string")
    .join(typeof separator === "string" ? separator : DEFAULT_JOIN_SEPARATOR);
}

export function registerHelpers(hbs: typeof Handlebars): void {
  // Comparison helpers
  hbs.registerHelper("eq", (a: unknown, b: unknown) => a === b);
  hbs.registerHelper("ne", (a: unknown, b: unknown) => a !== b);
  hbs.registerHelper("and", (a: unknown, b: unknown) => Boolean(a && b));
  hbs.registerHelper("or", (a: unknown, b: unknown) => Boolean(a || b));
  hbs.registerHelper("not", (a: unknown) => !a);

  hbs.registerHelper("formatDateTime", formatDateTime);
  hbs.registerHelper("join", join);
}
