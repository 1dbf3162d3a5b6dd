import { Arguments } from "./arguments.js";
import { type ArgumentError, mapResult, ParseResult } from "./result.js";
import { isNonEmpty, type Token } from "./types.js";

type AnyArguments = Arguments<unknown, unknown>;

/** The value type an Arguments produces */
export type ValueOf<A> = A extends Arguments<infer T, unknown> ? T : never;

/** The caller error type an Arguments may report; distributes over unions */
export type ErrorOf<A> = A extends Arguments<unknown, infer E> ? E : never;

/**
 * Run children on the shrinking token list. Errors of all children win over
 * early exits, which win over values.
 */
function combineAll<E>(children: readonly Arguments<unknown, E>[]): Arguments<unknown[], E> {
  return new Arguments<unknown[], E>(
    children.flatMap((child) => child.configurations),
    children.flatMap((child) => child.shortFlags),
    (tokens) => {
      let remaining: readonly Token[] = tokens;
      const values: unknown[] = [];
      const messages: string[] = [];
      const errors: ArgumentError<E>[] = [];

      for (const child of children) {
        const outcome = child.run(remaining);
        remaining = outcome.remaining;
        switch (outcome.result._tag) {
          case "Value":
            values.push(outcome.result.value);
            break;
          case "EarlyExit":
            messages.push(...outcome.result.messages);
            break;
          case "Failure":
            errors.push(...outcome.result.errors);
            break;
        }
      }

      if (isNonEmpty(errors)) {
        return { result: ParseResult.failure(errors), remaining };
      }
      if (isNonEmpty(messages)) {
        return { result: ParseResult.earlyExit(messages), remaining };
      }
      return { result: ParseResult.value(values), remaining };
    },
  );
}

/**
 * Map the parsed value. Configuration and short flags are kept.
 */
export function map<T, U, E>(args: Arguments<T, E>, f: (value: T) => U): Arguments<U, E> {
  return new Arguments<U, E>(args.configurations, args.shortFlags, (tokens) => {
    const { result, remaining } = args.run(tokens);
    return { result: mapResult(result, f), remaining };
  });
}

/**
 * Claims nothing and always produces `thunk()`.
 */
export function constant<T>(thunk: () => T): Arguments<T> {
  return new Arguments<T>([], [], (tokens) => ({
    result: ParseResult.value(thunk()),
    remaining: tokens,
  }));
}

/**
 * Combine any number of parsers into one over `f`'s result.
 *
 * @example
 * ```typescript
 * const greeting = combine(
 *   (name, loud) => (loud ? `HELLO ${name.toUpperCase()}` : `Hello ${name}`),
 *   stringValue(createDescription({ long: "name", short: "n" })),
 *   booleanFlag(createDescription({ long: "loud", default: false })),
 * );
 * ```
 */
export function combine<A extends readonly AnyArguments[], R>(
  f: (...values: { [K in keyof A]: ValueOf<A[K]> }) => R,
  ...args: A
): Arguments<R, ErrorOf<A[number]>>;
export function combine(
  f: (...values: unknown[]) => unknown,
  ...args: readonly AnyArguments[]
): AnyArguments {
  return map(combineAll(args), (values) => f(...values));
}

/**
 * Record form of {@link combine}: each key gets its parser's value.
 */
export function combineObject<S extends Readonly<Record<string, AnyArguments>>>(
  shape: S,
): Arguments<{ [K in keyof S]: ValueOf<S[K]> }, ErrorOf<S[keyof S]>>;
export function combineObject(
  shape: Readonly<Record<string, AnyArguments>>,
): Arguments<Record<string, unknown>, unknown> {
  const entries = Object.entries(shape);
  return map(combineAll(entries.map(([, args]) => args)), (values) =>
    Object.fromEntries(entries.map(([key], index) => [key, values[index]])),
  );
}
