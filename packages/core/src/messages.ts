import { getErrorMessage } from "@argot/errors";
import { toWellFormed } from "@argot/unicode";
import { ENGLISH, type Language } from "./language.js";
import { namesPattern } from "./patterns.js";
import type { ArgumentError } from "./result.js";

export interface FormatOptions<E> {
  language?: Language | undefined;
  /** Text shown below a parse error; defaults to {@link defaultFormatCause} */
  formatCause?: ((error: E) => string) | undefined;
}

/**
 * Message of an Error, a string as is, anything else through `String`.
 */
export function defaultFormatCause(error: unknown): string {
  if (error instanceof Error || typeof error === "string") {
    return getErrorMessage(error);
  }
  return String(error);
}

/**
 * Render one argument error, e.g. `Missing Value: --name(=| )VALUE | -n[=| ]VALUE`.
 */
export function formatArgumentError<E>(
  error: ArgumentError<E>,
  options: FormatOptions<E> = {},
): string {
  const language = options.language ?? ENGLISH;
  if (error._tag === "MissingFlag") {
    return `${language.missingFlag}: ${namesPattern(error.names, { _tag: "Flag", invert: error.invert })}`;
  }

  const pattern = namesPattern(error.names, {
    _tag: "Value",
    valueInfix: error.valueInfix,
    metaVar: error.metaVar,
  });
  switch (error._tag) {
    case "MissingValue":
      return `${language.missingValue}: ${pattern}`;
    case "ParseFailure": {
      if (error.cause._tag === "InvalidString") {
        return `${language.invalidString}: ${pattern}\n${toWellFormed(error.cause.raw)}`;
      }
      const formatCause = options.formatCause ?? defaultFormatCause;
      return `${language.parseError}: ${pattern}\n${formatCause(error.cause.error)}`;
    }
  }
}

/**
 * `Unused argument(s): ["-x", "y"]`
 */
export function formatUnused(unused: readonly string[], language: Language = ENGLISH): string {
  return `${language.unusedArguments}: [${unused.map((token) => JSON.stringify(token)).join(", ")}]`;
}
