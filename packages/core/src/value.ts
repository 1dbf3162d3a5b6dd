import { Comparison, isWellFormed, iterateGraphemes } from "@argot/unicode";
import { z } from "zod";
import { Arguments } from "./arguments.js";
import { NonEmptyStringSchema, rejectInvalid } from "./config.js";
import {
  displayDefault,
  namesOf,
  type ValueConfiguration,
} from "./configuration.js";
import type { Description } from "./description.js";
import { matchesAny } from "./matching.js";
import {
  type ArgumentError,
  type InvalidCause,
  type MissingValue,
  ParseResult,
} from "./result.js";
import { isNonEmpty, type Token } from "./types.js";

/**
 * Result of a value parse function
 */
export type ValueParseResult<T, E> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

export interface ValueOptions<T, E> {
  /** Placeholder shown in help text, e.g. `VALUE` */
  metaVar: string;
  /** Separator between name and value, e.g. `=` */
  valueInfix: string;
  parse: (raw: string) => ValueParseResult<T, E>;
  /** Display a default in help text; defaults to `String` */
  display?: ((value: T) => string) | undefined;
  /** Shown in help text only; parsing is up to `parse` */
  allowedValues?: readonly string[] | undefined;
}

const ValueOptionsSchema = z.object({
  metaVar: NonEmptyStringSchema,
  valueInfix: NonEmptyStringSchema,
  allowedValues: z.array(z.string()).optional(),
});

type TokenMatch = { readonly _tag: "Raw"; readonly raw: string } | { readonly _tag: "Await" };

const AWAIT: TokenMatch = { _tag: "Await" };

/**
 * Split at the first occurrence of the infix. Only offsets whose grapheme
 * can begin the infix are tried.
 */
function splitAtInfix(s: string, infix: Comparison): { name: string; raw: string } | undefined {
  let offset = 0;
  for (const grapheme of iterateGraphemes(s)) {
    if (infix.admitsLeading(grapheme)) {
      const raw = infix.stripPrefix(s.slice(offset));
      if (raw !== undefined) {
        return { name: s.slice(0, offset), raw };
      }
    }
    offset += grapheme.length;
  }
  return undefined;
}

/**
 * A value argument. Accepted shapes, with `=` as infix:
 * `--name=VALUE`, `--name VALUE`, `-n=VALUE`, `-nVALUE` and `-n VALUE`.
 *
 * A bare name consumes the next token whatever it is. Every parse error is
 * reported; otherwise the last parsed value wins, then the default.
 */
export function value<T, E>(
  description: Description<T>,
  options: ValueOptions<T, E>,
): Arguments<T, E> {
  const checked = ValueOptionsSchema.safeParse(options);
  if (!checked.success) {
    return rejectInvalid("ARGUMENT_DESCRIPTION_INVALID", "value options", checked.error);
  }

  const { metaVar, valueInfix, parse } = options;
  const display = options.display ?? ((v: T) => String(v));
  const allowedValues = options.allowedValues ?? [];
  const infix = Comparison.of(valueInfix, description.caseSensitive);
  const names = namesOf(description);

  const configuration: ValueConfiguration = {
    _tag: "Value",
    names,
    help: description.help,
    default: displayDefault(description, display),
    valueInfix,
    metaVar,
    allowedValues: isNonEmpty(allowedValues) ? allowedValues : undefined,
  };
  const missing: MissingValue = { _tag: "MissingValue", names, valueInfix, metaVar };
  const failure = (cause: InvalidCause<E>): ArgumentError<E> => ({
    _tag: "ParseFailure",
    names,
    valueInfix,
    metaVar,
    cause,
  });

  const matchToken = (token: string): TokenMatch | undefined => {
    const long = description.longPrefix.stripPrefix(token);
    if (long !== undefined) {
      if (matchesAny(description.long, long)) {
        return AWAIT;
      }
      const split = splitAtInfix(long, infix);
      return split !== undefined && matchesAny(description.long, split.name)
        ? { _tag: "Raw", raw: split.raw }
        : undefined;
    }

    const short = description.shortPrefix.stripPrefix(token);
    if (short === undefined) {
      return undefined;
    }
    const first = iterateGraphemes(short).next();
    if (first.done === true || !matchesAny(description.short, first.value)) {
      return undefined;
    }
    const rest = short.slice(first.value.length);
    if (rest === "") {
      return AWAIT;
    }
    return { _tag: "Raw", raw: infix.stripPrefix(rest) ?? rest };
  };

  const parseRaw = (raw: string): ValueParseResult<T, ArgumentError<E>> => {
    if (!isWellFormed(raw)) {
      return { success: false, error: failure({ _tag: "InvalidString", raw }) };
    }
    const parsed = parse(raw);
    return parsed.success
      ? parsed
      : { success: false, error: failure({ _tag: "Invalid", error: parsed.error }) };
  };

  return new Arguments<T, E>([configuration], [], (tokens) => {
    let latest: { value: T } | undefined;
    let awaiting = false;
    const errors: ArgumentError<E>[] = [];
    const remaining: Token[] = [];

    for (const token of tokens) {
      let raw: string;
      if (awaiting) {
        awaiting = false;
        remaining.push(undefined);
        if (token === undefined) {
          errors.push(missing);
          continue;
        }
        raw = token;
      } else {
        const matched = token === undefined ? undefined : matchToken(token);
        if (matched === undefined) {
          remaining.push(token);
          continue;
        }
        remaining.push(undefined);
        if (matched._tag === "Await") {
          awaiting = true;
          continue;
        }
        raw = matched.raw;
      }

      const parsed = parseRaw(raw);
      if (parsed.success) {
        latest = { value: parsed.value };
      } else {
        errors.push(parsed.error);
      }
    }
    if (awaiting) {
      errors.push(missing);
    }

    if (isNonEmpty(errors)) {
      return { result: ParseResult.failure(errors), remaining };
    }
    if (latest !== undefined) {
      return { result: ParseResult.value(latest.value), remaining };
    }
    if (description.default !== undefined) {
      return { result: ParseResult.value(description.default.value), remaining };
    }
    return { result: ParseResult.failure([missing]), remaining };
  });
}
