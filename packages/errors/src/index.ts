/**
 * @argot/errors
 *
 * Error taxonomy for the argot packages.
 *
 * Construction-time misconfiguration and rejected command lines are reported
 * through two base types: ValidationError and InternalError. Each error
 * carries a `.code` from the catalog that discriminates the specific
 * condition and the exit code a command-line front end should use.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { ArgotError, type ErrorJSON, isArgotError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type ExitCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  issuesFromZod,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError, ValidationError } from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ArgotErrorOptions,
  InternalCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isExpectedError, isInternalError, isValidationError } from "./guards.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@argot/errors";
export const PACKAGE_VERSION = "0.1.0";
