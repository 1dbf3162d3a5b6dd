import { Comparison } from "@argot/unicode";
import { z } from "zod";
import { GraphemeSchema, NonEmptyStringSchema, rejectInvalid } from "./config.js";
import { ENGLISH, type Language } from "./language.js";
import { mapNonEmpty, type NonEmptyArray } from "./types.js";

/**
 * Immutable metadata for one logical argument.
 */
export interface Description<T> {
  readonly longPrefix: Comparison;
  /** The first name is shown in help text and error messages */
  readonly long: NonEmptyArray<Comparison>;
  readonly shortPrefix: Comparison;
  readonly short: readonly Comparison[];
  readonly help: string | undefined;
  readonly default: { readonly value: T } | undefined;
  readonly caseSensitive: boolean;
}

export interface DescriptionOptions<T> {
  long: string | NonEmptyArray<string>;
  short?: string | readonly string[] | undefined;
  help?: string | undefined;
  /** `undefined` means no default */
  default?: T | undefined;
  /** Defaults to the language's long prefix */
  longPrefix?: string | undefined;
  /** Defaults to the language's short prefix */
  shortPrefix?: string | undefined;
  caseSensitive?: boolean | undefined;
}

export const DescriptionOptionsSchema = z.object({
  long: z.union([NonEmptyStringSchema, z.array(NonEmptyStringSchema).nonempty()]),
  short: z.union([GraphemeSchema, z.array(GraphemeSchema)]).optional(),
  help: z.string().optional(),
  longPrefix: NonEmptyStringSchema.optional(),
  shortPrefix: NonEmptyStringSchema.optional(),
  caseSensitive: z.boolean().optional(),
});

/**
 * Build a Description.
 *
 * @throws ValidationError (ARGUMENT_DESCRIPTION_INVALID) for an empty long
 * name list, an empty name or prefix, or a short name that is not exactly
 * one grapheme
 *
 * @example
 * ```typescript
 * const verbose = createDescription({ long: "verbose", short: "v", help: "Log more.", default: false });
 * ```
 */
export function createDescription<T>(
  options: DescriptionOptions<T>,
  language: Language = ENGLISH,
): Description<T> {
  const parsed = DescriptionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    return rejectInvalid("ARGUMENT_DESCRIPTION_INVALID", "argument description", parsed.error);
  }

  const {
    long,
    short = [],
    help,
    longPrefix = language.longPrefix,
    shortPrefix = language.shortPrefix,
    caseSensitive = false,
  } = parsed.data;
  const compare = (name: string): Comparison => Comparison.of(name, caseSensitive);
  const longNames: NonEmptyArray<string> = typeof long === "string" ? [long] : long;
  const shortNames = typeof short === "string" ? [short] : short;

  return {
    longPrefix: compare(longPrefix),
    long: mapNonEmpty(longNames, compare),
    shortPrefix: compare(shortPrefix),
    short: shortNames.map(compare),
    help,
    default: options.default !== undefined ? { value: options.default } : undefined,
    caseSensitive,
  };
}
