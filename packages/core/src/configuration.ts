import type { Comparison } from "@argot/unicode";
import type { Description } from "./description.js";
import { mapNonEmpty, type NonEmptyArray } from "./types.js";

/**
 * Display strings of an argument's names
 */
export interface ArgumentNames {
  readonly longPrefix: string;
  readonly long: NonEmptyArray<string>;
  readonly shortPrefix: string;
  readonly short: readonly string[];
}

export interface InvertPair {
  readonly prefix: string;
  readonly infix: string;
}

interface ConfigurationBase {
  readonly names: ArgumentNames;
  readonly help: string | undefined;
  /** Display string of the default value */
  readonly default: string | undefined;
}

/**
 * A flag. Early-exit flags such as `--help` have no invert pair.
 */
export interface FlagConfiguration extends ConfigurationBase {
  readonly _tag: "Flag";
  readonly invert: InvertPair | undefined;
}

export interface ValueConfiguration extends ConfigurationBase {
  readonly _tag: "Value";
  readonly valueInfix: string;
  readonly metaVar: string;
  readonly allowedValues: NonEmptyArray<string> | undefined;
}

/**
 * Type-erased display projection of a Description, used for help text.
 */
export type Configuration = FlagConfiguration | ValueConfiguration;

/**
 * Short flag names that may be bundled behind one prefix (`-vq`).
 */
export interface ShortFlagGroup {
  readonly prefix: Comparison;
  readonly forms: readonly Comparison[];
}

export function namesOf(description: Description<unknown>): ArgumentNames {
  return {
    longPrefix: description.longPrefix.text,
    long: mapNonEmpty(description.long, (name) => name.text),
    shortPrefix: description.shortPrefix.text,
    short: description.short.map((name) => name.text),
  };
}

/** The group registering a description's short names, if it has any */
export function shortFlagGroupOf(description: Description<unknown>): ShortFlagGroup[] {
  if (description.short.length === 0) {
    return [];
  }
  return [{ prefix: description.shortPrefix, forms: description.short }];
}

/** Display string of a description's default */
export function displayDefault<T>(
  description: Description<T>,
  display: (value: T) => string,
): string | undefined {
  return description.default === undefined ? undefined : display(description.default.value);
}
