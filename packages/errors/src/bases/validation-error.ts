import { ArgotError } from "../base.js";
import { type CodesForBase, ERROR_CATALOG, type ErrorDomain, type ExitCode } from "../catalog.js";
import type { ArgotErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid descriptions, language tables, options or
 * command lines. The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = ValidationCode> extends ArgotError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly exitCode: ExitCode;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ArgotErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(options.message, options.metadata, options.cause ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.exitCode = entry.exitCode;
    this.isExpected = entry.isExpected;
    this.issues = options.issues ?? [];
  }
}
