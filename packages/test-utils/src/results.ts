import { assert } from "vitest";

/**
 * Structural view of a parse result, so these helpers need no dependency on
 * the parser package.
 */
export type ParseResultLike<T, Err> =
  | { readonly _tag: "Value"; readonly value: T }
  | { readonly _tag: "EarlyExit"; readonly messages: readonly string[] }
  | { readonly _tag: "Failure"; readonly errors: readonly Err[] };

function describeResult(result: { readonly _tag: string }): string {
  return JSON.stringify(result);
}

/** Assert a Value result and return its value */
export function expectValue<T, Err>(result: ParseResultLike<T, Err>): T {
  if (result._tag !== "Value") {
    return assert.fail(`Expected a Value result, got ${describeResult(result)}`);
  }
  return result.value;
}

/** Assert an EarlyExit result and return its messages */
export function expectEarlyExit<T, Err>(result: ParseResultLike<T, Err>): readonly string[] {
  if (result._tag !== "EarlyExit") {
    return assert.fail(`Expected an EarlyExit result, got ${describeResult(result)}`);
  }
  return result.messages;
}

/** Assert a Failure result and return its errors */
export function expectFailure<T, Err>(result: ParseResultLike<T, Err>): readonly Err[] {
  if (result._tag !== "Failure") {
    return assert.fail(`Expected a Failure result, got ${describeResult(result)}`);
  }
  return result.errors;
}
