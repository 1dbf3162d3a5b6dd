import { Comparison } from "@argot/unicode";
import { z } from "zod";
import { Arguments } from "./arguments.js";
import { NonEmptyStringSchema, rejectInvalid } from "./config.js";
import {
  displayDefault,
  type FlagConfiguration,
  namesOf,
  shortFlagGroupOf,
} from "./configuration.js";
import type { Description } from "./description.js";
import { ENGLISH, type Language } from "./language.js";
import { matchesAny, matchesFlagName } from "./matching.js";
import { type MissingFlag, ParseResult } from "./result.js";
import type { Token } from "./types.js";

export interface FlagOptions<T> {
  /** Map the flag's state to the parsed value */
  convert: (active: boolean) => T;
  /** Display a default in help text; defaults to `String` */
  display?: ((value: T) => string) | undefined;
  /** `no` in `--no-verbose` */
  invertPrefix: string;
  /** `-` in `--no-verbose`; may be empty */
  invertInfix: string;
}

const FlagOptionsSchema = z.object({
  invertPrefix: NonEmptyStringSchema,
  invertInfix: z.string(),
});

/**
 * A flag: `--name` and `-n` set it, `--no-name` clears it. The last matching
 * token wins; without one the default applies, or the flag is reported
 * missing.
 */
export function flag<T>(description: Description<T>, options: FlagOptions<T>): Arguments<T> {
  const checked = FlagOptionsSchema.safeParse(options);
  if (!checked.success) {
    return rejectInvalid("ARGUMENT_DESCRIPTION_INVALID", "flag options", checked.error);
  }

  const { convert, invertPrefix, invertInfix } = options;
  const display = options.display ?? ((value: T) => String(value));
  const invertPrefixName = Comparison.of(invertPrefix, description.caseSensitive);
  const invertInfixName = Comparison.of(invertInfix, description.caseSensitive);
  const names = namesOf(description);
  const invert = { prefix: invertPrefix, infix: invertInfix };

  const configuration: FlagConfiguration = {
    _tag: "Flag",
    names,
    help: description.help,
    default: displayDefault(description, display),
    invert,
  };
  const missing: MissingFlag = { _tag: "MissingFlag", names, invert };

  const matchToken = (token: string): boolean | undefined => {
    if (matchesFlagName(description, token)) {
      return true;
    }
    const long = description.longPrefix.stripPrefix(token);
    const afterPrefix = long === undefined ? undefined : invertPrefixName.stripPrefix(long);
    const name = afterPrefix === undefined ? undefined : invertInfixName.stripPrefix(afterPrefix);
    return name !== undefined && matchesAny(description.long, name) ? false : undefined;
  };

  return new Arguments<T>([configuration], shortFlagGroupOf(description), (tokens) => {
    let state: boolean | undefined;
    const remaining: Token[] = [];
    for (const token of tokens) {
      const matched = token === undefined ? undefined : matchToken(token);
      if (matched === undefined) {
        remaining.push(token);
      } else {
        state = matched;
        remaining.push(undefined);
      }
    }

    if (state !== undefined) {
      return { result: ParseResult.value(convert(state)), remaining };
    }
    if (description.default !== undefined) {
      return { result: ParseResult.value(description.default.value), remaining };
    }
    return { result: ParseResult.failure([missing]), remaining };
  });
}

/**
 * A boolean flag using the language's invert prefix and infix.
 */
export function booleanFlag(
  description: Description<boolean>,
  language: Language = ENGLISH,
): Arguments<boolean> {
  return flag(description, {
    convert: (active) => active,
    invertPrefix: language.invertPrefix,
    invertInfix: language.invertInfix,
  });
}
