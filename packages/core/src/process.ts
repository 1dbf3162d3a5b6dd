import { ValidationError, type ValidationIssue, wrapError } from "@argot/errors";
import { z } from "zod";
import type { Arguments } from "./arguments.js";
import { rejectInvalid } from "./config.js";
import { logDebug } from "./debug.js";
import { ENGLISH, type Language, LanguageSchema } from "./language.js";
import { defaultFormatCause, formatArgumentError, formatUnused } from "./messages.js";
import type { ArgumentError, ParseResult } from "./result.js";
import type { NonEmptyArray } from "./types.js";

/**
 * Where the process wrappers print and how they exit.
 */
export interface ProcessIO {
  stdout(line: string): void;
  stderr(line: string): void;
  exit(code: number): never;
}

export const NODE_PROCESS_IO: ProcessIO = {
  stdout: (line) => {
    console.log(line);
  },
  stderr: (line) => {
    console.error(line);
  },
  exit: (code) => process.exit(code),
};

export interface ProcessOptions<E> {
  /** Exit code for rejected command lines; non-zero, defaults to 1 */
  exitCode?: number | undefined;
  language?: Language | undefined;
  /** Defaults to {@link argvFromProcess} */
  argv?: readonly string[] | undefined;
  io?: ProcessIO | undefined;
  formatCause?: ((error: E) => string) | undefined;
}

export const ProcessOptionsSchema = z.object({
  exitCode: z
    .number()
    .int()
    .refine((code) => code !== 0, { message: "Must not be 0" })
    .optional(),
  language: LanguageSchema.optional(),
  argv: z.array(z.string()).optional(),
  io: z
    .object({
      stdout: z.function(),
      stderr: z.function(),
      exit: z.function(),
    })
    .optional(),
  formatCause: z.function().optional(),
});

interface ResolvedProcessOptions<E> {
  readonly exitCode: number;
  readonly language: Language;
  readonly argv: readonly string[];
  readonly io: ProcessIO;
  readonly formatCause: (error: E) => string;
}

function resolveOptions<E>(options: ProcessOptions<E>): ResolvedProcessOptions<E> {
  const checked = ProcessOptionsSchema.safeParse(options);
  if (!checked.success) {
    return rejectInvalid("ARGUMENT_OPTIONS_INVALID", "process options", checked.error);
  }
  return {
    exitCode: options.exitCode ?? 1,
    language: options.language ?? ENGLISH,
    argv: options.argv ?? argvFromProcess(),
    io: options.io ?? NODE_PROCESS_IO,
    formatCause: options.formatCause ?? defaultFormatCause,
  };
}

/**
 * Command-line arguments without the runtime and script path.
 */
export function argvFromProcess(): string[] {
  return process.argv.slice(2);
}

/**
 * Run caller code (`parse`, `convert`, `formatCause`). Anything
 * it throws that is not an ArgotError is rethrown as an InternalError.
 */
function guard<R>(run: () => R): R {
  try {
    return run();
  } catch (error) {
    throw wrapError(error);
  }
}

function printErrors<E>(
  errors: NonEmptyArray<ArgumentError<E>>,
  resolved: ResolvedProcessOptions<E>,
): void {
  const lines = guard(() =>
    errors.map((error) =>
      formatArgumentError(error, { language: resolved.language, formatCause: resolved.formatCause }),
    ),
  );
  for (const line of lines) {
    resolved.io.stderr(line);
  }
}

/**
 * Parse, returning the value only when everything was used.
 *
 * Early-exit messages go to stdout with exit code 0. Errors and unused
 * arguments go to stderr with `exitCode`. An exception from caller code is
 * rethrown as an InternalError without printing or exiting.
 */
export function parseComplete<T, E>(args: Arguments<T, E>, options: ProcessOptions<E> = {}): T {
  const resolved = resolveOptions(options);
  const { io, exitCode } = resolved;
  const { result, unused } = guard(() => args.parse(resolved.argv));

  switch (result._tag) {
    case "Value":
      if (unused.length === 0) {
        return result.value;
      }
      logDebug("process", `rejecting ${unused.length} unused argument(s)`);
      io.stderr(formatUnused(unused, resolved.language));
      return io.exit(exitCode);
    case "EarlyExit":
      logDebug("process", `early exit with ${result.messages.length} message(s)`);
      for (const message of result.messages) {
        io.stdout(message);
      }
      return io.exit(0);
    case "Failure":
      logDebug("process", `rejecting with ${result.errors.length} error(s)`);
      printErrors(result.errors, resolved);
      return io.exit(exitCode);
  }
}

export type EarlyExitParse<T, E> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly errors: NonEmptyArray<ArgumentError<E>> };

/**
 * Parse, handling only early exits: their messages go to stdout with exit
 * code 0. Errors and unused arguments are left to the caller.
 */
export function parseWithEarlyExit<T, E>(
  args: Arguments<T, E>,
  options: ProcessOptions<E> = {},
): { result: EarlyExitParse<T, E>; unused: string[] } {
  const resolved = resolveOptions(options);
  const { result, unused } = guard(() => args.parse(resolved.argv));

  switch (result._tag) {
    case "Value":
      return { result: { success: true, value: result.value }, unused };
    case "EarlyExit":
      logDebug("process", `early exit with ${result.messages.length} message(s)`);
      for (const message of result.messages) {
        resolved.io.stdout(message);
      }
      return resolved.io.exit(0);
    case "Failure":
      return { result: { success: false, errors: result.errors }, unused };
  }
}

/** A parse that neither failed nor left arguments unused */
export type AcceptedParse<T> = Extract<ParseResult<T, never>, { _tag: "Value" | "EarlyExit" }>;

/**
 * Parse without printing or exiting.
 *
 * @throws ValidationError (ARGUMENTS_REJECTED) listing every argument error
 * @throws ValidationError (ARGUMENTS_UNUSED) when tokens were left over
 * @throws InternalError when caller code such as a value's `parse` throws
 */
export function parseOrThrow<T, E>(
  args: Arguments<T, E>,
  argv: readonly string[],
  options: Pick<ProcessOptions<E>, "language" | "formatCause"> = {},
): AcceptedParse<T> {
  const language = options.language ?? ENGLISH;
  const { result, unused } = guard(() => args.parse(argv));

  if (result._tag === "Failure") {
    const issues: ValidationIssue[] = result.errors.map((error) => ({
      field: error.names.long[0],
      message: guard(() => formatArgumentError(error, options)),
      code: error._tag,
    }));
    throw new ValidationError({
      code: "ARGUMENTS_REJECTED",
      message: issues.map((issue) => issue.message).join("\n"),
      issues,
    });
  }
  if (result._tag === "Value" && unused.length > 0) {
    throw new ValidationError({
      code: "ARGUMENTS_UNUSED",
      message: formatUnused(unused, language),
      issues: unused.map((token) => ({
        field: token,
        message: language.unusedArguments,
        code: "UnusedArgument",
      })),
    });
  }
  return result;
}
