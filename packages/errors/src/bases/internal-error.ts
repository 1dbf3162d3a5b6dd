import { ArgotError } from "../base.js";
import { ERROR_CATALOG } from "../catalog.js";

const entry = ERROR_CATALOG.INTERNAL_ERROR;

/**
 * Errors caused by bugs, or by values thrown from caller code that are not
 * ArgotErrors themselves (see `wrapError`).
 */
export class InternalError extends ArgotError {
  readonly _tag = "InternalError" as const;
  override readonly code = "INTERNAL_ERROR" as const;
  override readonly domain = entry.domain;
  override readonly exitCode = entry.exitCode;
  override readonly isExpected = entry.isExpected;

  constructor(message: string, metadata?: Record<string, string>, cause?: Error) {
    super(message, metadata, cause ? { cause } : undefined);
  }
}
