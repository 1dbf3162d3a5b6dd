/**
 * Debug tracing, enabled with ARGOT_DEBUG=1 or ARGOT_DEBUG=true.
 *
 * User-facing output never goes through here; see ProcessIO.
 */

export const DEBUG_ENV_VAR = "ARGOT_DEBUG";

export function isDebugEnabled(): boolean {
  const value = process.env[DEBUG_ENV_VAR];
  return value === "true" || value === "1";
}

/**
 * Log a debug line with a consistent format: [argot:scope] message
 */
export function logDebug(scope: string, message: string): void {
  if (isDebugEnabled()) {
    console.warn(`[argot:${scope}] ${message}`);
  }
}
