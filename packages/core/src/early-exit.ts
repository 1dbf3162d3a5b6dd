import { Arguments } from "./arguments.js";
import { type FlagConfiguration, namesOf, shortFlagGroupOf } from "./configuration.js";
import { createDescription, type Description } from "./description.js";
import { type HelpTextOptions, renderHelpText, validateHelpTextOptions } from "./help-text.js";
import { ENGLISH, type Language } from "./language.js";
import { matchesFlagName } from "./matching.js";
import { ParseResult } from "./result.js";
import { concatNonEmpty, isNonEmpty, type NonEmptyArray, type Token } from "./types.js";

export function earlyExitConfiguration(description: Description<unknown>): FlagConfiguration {
  return {
    _tag: "Flag",
    names: namesOf(description),
    help: description.help,
    default: undefined,
    invert: undefined,
  };
}

/**
 * Wrap `args` with a flag that requests an early exit with `message`.
 *
 * The wrapped parser always runs on the remaining tokens. Its own early-exit
 * messages come first; otherwise a matched flag replaces its result, even a
 * failure, so `--help` works while required arguments are missing.
 */
export function earlyExit<T, E>(
  args: Arguments<T, E>,
  description: Description<unknown>,
  message: string,
): Arguments<T, E> {
  return new Arguments<T, E>(
    [...args.configurations, earlyExitConfiguration(description)],
    [...args.shortFlags, ...shortFlagGroupOf(description)],
    (tokens) => {
      const messages: string[] = [];
      const rest: Token[] = tokens.map((token) => {
        if (token !== undefined && matchesFlagName(description, token)) {
          messages.push(message);
          return undefined;
        }
        return token;
      });

      const inner = args.run(rest);
      if (inner.result._tag === "EarlyExit") {
        return {
          result: ParseResult.earlyExit(concatNonEmpty(inner.result.messages, messages)),
          remaining: inner.remaining,
        };
      }
      if (isNonEmpty(messages)) {
        return { result: ParseResult.earlyExit(messages), remaining: inner.remaining };
      }
      return inner;
    },
  );
}

/** Names replacing the language's defaults */
export interface FlagNameOptions {
  long?: string | NonEmptyArray<string> | undefined;
  /** Pass `[]` for no short name */
  short?: string | readonly string[] | undefined;
}

export interface VersionOptions extends FlagNameOptions {
  programName: string;
  version: string;
  language?: Language | undefined;
}

export interface HelpOptions extends HelpTextOptions, FlagNameOptions {}

/**
 * `--version` / `-v`, printing `{programName} {version}`.
 */
export function version<T, E>(args: Arguments<T, E>, options: VersionOptions): Arguments<T, E> {
  validateHelpTextOptions({ programName: options.programName, version: options.version });
  const language = options.language ?? ENGLISH;
  const description = createDescription(
    {
      long: options.long ?? language.versionLong,
      short: options.short ?? language.versionShort,
      help: language.versionDescription,
    },
    language,
  );
  return earlyExit(args, description, `${options.programName} ${options.version}`);
}

/**
 * `--help` / `-h`, printing help text that lists every configuration of
 * `args` and the help flag itself.
 */
export function help<T, E>(args: Arguments<T, E>, options: HelpOptions): Arguments<T, E> {
  validateHelpTextOptions(options);
  const language = options.language ?? ENGLISH;
  const description = createDescription(
    {
      long: options.long ?? language.helpLong,
      short: options.short ?? language.helpShort,
      help: language.helpDescription,
    },
    language,
  );
  const text = renderHelpText(
    [...args.configurations, earlyExitConfiguration(description)],
    options,
  );
  return earlyExit(args, description, text);
}

/**
 * Version flag, then help flag, both with the language's names.
 */
export function helpAndVersion<T, E>(
  args: Arguments<T, E>,
  options: HelpTextOptions & { version: string },
): Arguments<T, E> {
  return help(
    version(args, {
      programName: options.programName,
      version: options.version,
      language: options.language,
    }),
    options,
  );
}

/**
 * Help text for `args` without registering a help flag.
 */
export function helpText(args: Arguments<unknown, unknown>, options: HelpTextOptions): string {
  validateHelpTextOptions(options);
  return renderHelpText(args.configurations, options);
}
