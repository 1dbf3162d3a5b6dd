import type { ArgumentNames, InvertPair } from "./configuration.js";
import type { NonEmptyArray } from "./types.js";

/**
 * Why a value could not be parsed: the caller's error, or a raw token that
 * is not well-formed UTF-16.
 */
export type InvalidCause<E> =
  | { readonly _tag: "Invalid"; readonly error: E }
  | { readonly _tag: "InvalidString"; readonly raw: string };

export interface MissingFlag {
  readonly _tag: "MissingFlag";
  readonly names: ArgumentNames;
  readonly invert: InvertPair;
}

export interface MissingValue {
  readonly _tag: "MissingValue";
  readonly names: ArgumentNames;
  readonly valueInfix: string;
  readonly metaVar: string;
}

export interface ParseFailure<E> {
  readonly _tag: "ParseFailure";
  readonly names: ArgumentNames;
  readonly valueInfix: string;
  readonly metaVar: string;
  readonly cause: InvalidCause<E>;
}

export type ArgumentError<E> = MissingFlag | MissingValue | ParseFailure<E>;

/**
 * Outcome of parsing: a value, a request to exit early with messages
 * (help, version), or every error found in one pass.
 */
export type ParseResult<T, E> =
  | { readonly _tag: "Value"; readonly value: T }
  | { readonly _tag: "EarlyExit"; readonly messages: NonEmptyArray<string> }
  | { readonly _tag: "Failure"; readonly errors: NonEmptyArray<ArgumentError<E>> };

export const ParseResult = {
  value<T>(value: T): ParseResult<T, never> {
    return { _tag: "Value", value };
  },
  earlyExit(messages: NonEmptyArray<string>): ParseResult<never, never> {
    return { _tag: "EarlyExit", messages };
  },
  failure<E = never>(errors: NonEmptyArray<ArgumentError<E>>): ParseResult<never, E> {
    return { _tag: "Failure", errors };
  },
} as const;

export function mapResult<T, U, E>(result: ParseResult<T, E>, f: (value: T) => U): ParseResult<U, E> {
  if (result._tag === "Value") {
    return ParseResult.value(f(result.value));
  }
  return result;
}
