import { issuesFromZod, ValidationError } from "@argot/errors";
import { isSingleGrapheme } from "@argot/unicode";
import { z } from "zod";

/** Error codes raised while building descriptions, languages or options */
export type ConfigurationErrorCode =
  | "ARGUMENT_DESCRIPTION_INVALID"
  | "ARGUMENT_LANGUAGE_INVALID"
  | "ARGUMENT_OPTIONS_INVALID";

/** A non-empty string */
export const NonEmptyStringSchema = z.string().min(1, "Must not be empty");

/** A string consisting of exactly one grapheme cluster */
export const GraphemeSchema = z
  .string()
  .refine(isSingleGrapheme, { message: "Must be exactly one grapheme" });

/**
 * Throw a ValidationError listing every zod issue of a rejected input.
 */
export function rejectInvalid(
  code: ConfigurationErrorCode,
  subject: string,
  error: z.ZodError,
): never {
  const issues = issuesFromZod(error, subject);
  const details = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
  throw new ValidationError({
    code,
    message: `Invalid ${subject}: ${details}`,
    issues,
  });
}
