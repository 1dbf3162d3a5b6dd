/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code thrown by the argot packages is listed here. Each code maps
 * to a base error type, a domain, and the process exit code a command-line
 * front end should use when the error reaches the top level.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, description, language, options, arguments
 */

/**
 * The base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and unknown failures
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    exitCode: 70,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONSTRUCTION ERRORS - Misconfigured descriptions, languages, options
  // ============================================================================
  ARGUMENT_DESCRIPTION_INVALID: {
    domain: "description",
    exitCode: 78,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid argument description",
    description: "An argument description has no long name, an empty prefix, or a short name that is not a single grapheme",
  },
  ARGUMENT_LANGUAGE_INVALID: {
    domain: "language",
    exitCode: 78,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid language table",
    description: "A language table is missing strings required for matching or help output",
  },
  ARGUMENT_OPTIONS_INVALID: {
    domain: "options",
    exitCode: 78,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid parse options",
    description: "The options passed to a parse entry point failed validation",
  },

  // ============================================================================
  // ARGUMENT ERRORS - Rejected command lines
  // ============================================================================
  ARGUMENTS_REJECTED: {
    domain: "arguments",
    exitCode: 64,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Arguments rejected",
    description: "A required argument is missing or a value could not be parsed",
  },
  ARGUMENTS_UNUSED: {
    domain: "arguments",
    exitCode: 64,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Unused arguments",
    description: "Some command-line arguments were not recognized by any argument",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Process exit codes used in the catalog
 */
export type ExitCode = ErrorCatalogEntry["exitCode"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
