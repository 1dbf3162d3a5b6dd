import type { ZodError } from "zod";
import { ArgotError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Wrap an unknown error into an ArgotError.
 * If the error is already an ArgotError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): ArgotError {
  if (error instanceof ArgotError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, error);
  }

  return new InternalError(getErrorMessage(error));
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Convert zod issues into ValidationIssues. Nested paths are joined with dots;
 * an issue on the root object is reported against `rootField`.
 */
export function issuesFromZod(error: ZodError, rootField = "root"): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : rootField,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - Exit codes are in the range a process can report (1-255)
 * - Expected errors use the usage exit code 64
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const code of getAllErrorCodes()) {
    const entry = ERROR_CATALOG[code];
    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }
    if (entry.exitCode < 1 || entry.exitCode > 255) {
      errors.push(`Code '${code}' has invalid exit code ${entry.exitCode}`);
    }
    if (entry.isExpected && entry.exitCode !== 64) {
      errors.push(`Code '${code}' is expected but does not exit with 64`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
