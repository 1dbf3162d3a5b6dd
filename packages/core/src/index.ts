/**
 * @argot/core
 *
 * Composable command-line argument parsers.
 *
 * Describe each argument with {@link createDescription}, build parsers with
 * `flag`, `value` and their convenience forms, compose them with `combine`,
 * and add `--help` / `--version` with `helpAndVersion`.
 */

// ============================================================================
// PARSERS
// ============================================================================

export { Arguments, type Step, type StepOutcome } from "./arguments.js";
export { expandShortFlags } from "./bundles.js";
export { combine, combineObject, constant, type ErrorOf, map, type ValueOf } from "./combine.js";
export {
  earlyExit,
  type FlagNameOptions,
  help,
  helpAndVersion,
  type HelpOptions,
  helpText,
  version,
  type VersionOptions,
} from "./early-exit.js";
export { booleanFlag, flag, type FlagOptions } from "./flag.js";
export { value, type ValueOptions, type ValueParseResult } from "./value.js";
export {
  type EnumValueOptions,
  enumValue,
  integerValue,
  numberValue,
  stringValue,
  type ValueKindOptions,
} from "./value-kinds.js";

// ============================================================================
// DESCRIPTIONS & CONFIGURATION
// ============================================================================

export {
  type ArgumentNames,
  type Configuration,
  type FlagConfiguration,
  type InvertPair,
  type ShortFlagGroup,
  type ValueConfiguration,
} from "./configuration.js";
export {
  createDescription,
  type Description,
  type DescriptionOptions,
  DescriptionOptionsSchema,
} from "./description.js";
export { defineLanguage, ENGLISH, GERMAN, type Language, LanguageSchema } from "./language.js";

// ============================================================================
// RESULTS & MESSAGES
// ============================================================================

export {
  type ArgumentError,
  type InvalidCause,
  mapResult,
  type MissingFlag,
  type MissingValue,
  type ParseFailure,
  ParseResult,
} from "./result.js";
export { type HelpTextOptions, HelpTextOptionsSchema, renderHelpText } from "./help-text.js";
export {
  defaultFormatCause,
  type FormatOptions,
  formatArgumentError,
  formatUnused,
} from "./messages.js";
export { longPattern, namesPattern, type PatternKind, shortPattern } from "./patterns.js";

// ============================================================================
// PROCESS
// ============================================================================

export {
  type AcceptedParse,
  argvFromProcess,
  type EarlyExitParse,
  NODE_PROCESS_IO,
  parseComplete,
  parseOrThrow,
  parseWithEarlyExit,
  type ProcessIO,
  type ProcessOptions,
  ProcessOptionsSchema,
} from "./process.js";
export { DEBUG_ENV_VAR, isDebugEnabled, logDebug } from "./debug.js";
export { isNonEmpty, type NonEmptyArray, type Token } from "./types.js";

export const PACKAGE_NAME = "@argot/core";
