import { type Comparison, isSingleGrapheme } from "@argot/unicode";
import type { Description } from "./description.js";

export function matchesAny(names: readonly Comparison[], s: string): boolean {
  return names.some((name) => name.matches(s));
}

/**
 * `--name` or `-n`. Short names are tried only when the long prefix does
 * not strip.
 */
export function matchesFlagName(description: Description<unknown>, token: string): boolean {
  const long = description.longPrefix.stripPrefix(token);
  if (long !== undefined) {
    return matchesAny(description.long, long);
  }
  const short = description.shortPrefix.stripPrefix(token);
  return short !== undefined && isSingleGrapheme(short) && matchesAny(description.short, short);
}
