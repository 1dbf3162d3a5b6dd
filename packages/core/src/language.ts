import { z } from "zod";
import { GraphemeSchema, NonEmptyStringSchema, rejectInvalid } from "./config.js";

/**
 * Every string used for matching, help text and error messages.
 */
export const LanguageSchema = z
  .object({
    longPrefix: NonEmptyStringSchema,
    shortPrefix: NonEmptyStringSchema,
    invertPrefix: NonEmptyStringSchema,
    invertInfix: NonEmptyStringSchema,
    valueInfix: NonEmptyStringSchema,
    metaVar: NonEmptyStringSchema,
    options: NonEmptyStringSchema,
    default: NonEmptyStringSchema,
    allowedValues: NonEmptyStringSchema,
    missingFlag: NonEmptyStringSchema,
    missingValue: NonEmptyStringSchema,
    parseError: NonEmptyStringSchema,
    invalidString: NonEmptyStringSchema,
    unusedArguments: NonEmptyStringSchema,
    helpLong: NonEmptyStringSchema,
    helpShort: GraphemeSchema,
    helpDescription: NonEmptyStringSchema,
    versionLong: NonEmptyStringSchema,
    versionShort: GraphemeSchema,
    versionDescription: NonEmptyStringSchema,
  })
  .strict();

export type Language = Readonly<z.infer<typeof LanguageSchema>>;

/**
 * Validate a language table.
 *
 * @throws ValidationError (ARGUMENT_LANGUAGE_INVALID) when a string is empty
 * or a short name is not a single grapheme
 *
 * @example
 * ```typescript
 * const tilde = defineLanguage({ ...ENGLISH, shortPrefix: "~" });
 * ```
 */
export function defineLanguage(table: Language): Language {
  const parsed = LanguageSchema.safeParse(table);
  if (!parsed.success) {
    return rejectInvalid("ARGUMENT_LANGUAGE_INVALID", "language", parsed.error);
  }
  return Object.freeze(parsed.data);
}

export const ENGLISH: Language = defineLanguage({
  longPrefix: "--",
  shortPrefix: "-",
  invertPrefix: "no",
  invertInfix: "-",
  valueInfix: "=",
  metaVar: "VALUE",
  options: "OPTIONS",
  default: "Default",
  allowedValues: "Possible values",
  missingFlag: "Missing Flag",
  missingValue: "Missing Value",
  parseError: "Parse Error",
  invalidString: "Invalid String",
  unusedArguments: "Unused argument(s)",
  helpLong: "help",
  helpShort: "h",
  helpDescription: "Show this text.",
  versionLong: "version",
  versionShort: "v",
  versionDescription: "Show the current version.",
});

export const GERMAN: Language = defineLanguage({
  longPrefix: "--",
  shortPrefix: "-",
  invertPrefix: "kein",
  invertInfix: "-",
  valueInfix: "=",
  metaVar: "WERT",
  options: "OPTIONEN",
  default: "Standard",
  allowedValues: "Erlaubte Werte",
  missingFlag: "Fehlende Flag",
  missingValue: "Fehlender Wert",
  parseError: "Parse-Fehler",
  invalidString: "Invalider String",
  unusedArguments: "Nicht alle Argumente verwendet",
  helpLong: "hilfe",
  helpShort: "h",
  helpDescription: "Zeige diesen Text an.",
  versionLong: "version",
  versionShort: "v",
  versionDescription: "Zeige die aktuelle Version an.",
});
