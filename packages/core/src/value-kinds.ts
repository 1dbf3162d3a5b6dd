import { Comparison } from "@argot/unicode";
import type { Arguments } from "./arguments.js";
import type { Description } from "./description.js";
import { ENGLISH, type Language } from "./language.js";
import { mapNonEmpty, type NonEmptyArray } from "./types.js";
import { type ValueParseResult, value } from "./value.js";

export interface ValueKindOptions {
  language?: Language | undefined;
  /** Defaults to the language's meta variable */
  metaVar?: string | undefined;
}

const INTEGER = /^[+-]?\d+$/;

export function stringValue(
  description: Description<string>,
  options: ValueKindOptions = {},
): Arguments<string> {
  const language = options.language ?? ENGLISH;
  return value<string, never>(description, {
    metaVar: options.metaVar ?? language.metaVar,
    valueInfix: language.valueInfix,
    parse: (raw) => ({ success: true, value: raw }),
  });
}

/**
 * A finite number in any notation `Number` accepts.
 */
export function numberValue(
  description: Description<number>,
  options: ValueKindOptions = {},
): Arguments<number, string> {
  const language = options.language ?? ENGLISH;
  return value(description, {
    metaVar: options.metaVar ?? language.metaVar,
    valueInfix: language.valueInfix,
    parse: (raw): ValueParseResult<number, string> => {
      const parsed = Number(raw);
      return raw.trim() !== "" && Number.isFinite(parsed)
        ? { success: true, value: parsed }
        : { success: false, error: `Not a number: ${raw}` };
    },
  });
}

/**
 * A safe integer written in decimal, with an optional sign.
 */
export function integerValue(
  description: Description<number>,
  options: ValueKindOptions = {},
): Arguments<number, string> {
  const language = options.language ?? ENGLISH;
  return value(description, {
    metaVar: options.metaVar ?? language.metaVar,
    valueInfix: language.valueInfix,
    parse: (raw): ValueParseResult<number, string> => {
      const parsed = Number(raw);
      return INTEGER.test(raw) && Number.isSafeInteger(parsed)
        ? { success: true, value: parsed }
        : { success: false, error: `Not an integer: ${raw}` };
    },
  });
}

export interface EnumValueOptions<T> extends ValueKindOptions {
  variants: NonEmptyArray<T>;
  /** Name of a variant on the command line and in help text; defaults to `String` */
  display?: ((variant: T) => string) | undefined;
  caseSensitive?: boolean | undefined;
}

/**
 * One of a fixed set of variants, matched by display name (case-insensitive
 * unless `caseSensitive` is set). The variants are listed in help text.
 *
 * @example
 * ```typescript
 * const mode = enumValue(createDescription({ long: "mode", default: "fast" }), {
 *   variants: ["fast", "safe"] as const,
 * });
 * ```
 */
export function enumValue<T>(
  description: Description<T>,
  options: EnumValueOptions<T>,
): Arguments<T, string> {
  const language = options.language ?? ENGLISH;
  const display = options.display ?? ((variant: T) => String(variant));
  const variants = mapNonEmpty(options.variants, (variant) => ({
    variant,
    name: Comparison.of(display(variant), options.caseSensitive ?? false),
  }));

  return value(description, {
    metaVar: options.metaVar ?? language.metaVar,
    valueInfix: language.valueInfix,
    display,
    allowedValues: variants.map(({ name }) => name.text),
    parse: (raw): ValueParseResult<T, string> => {
      const match = variants.find(({ name }) => name.matches(raw));
      return match !== undefined
        ? { success: true, value: match.variant }
        : { success: false, error: `Unknown value: ${raw}` };
    },
  });
}
