/**
 * Standardized error message utilities for consistent error formatting
 */

/**
 * Extract a human-readable error message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extract the system error code (EADDRINUSE, ENOENT, ...) if there is one
 */
export function getErrorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Creates a not found error message
 */
export const notFoundError = (item: string, type: string): string => {
  return `${type} "${item}" not found`;
};

/**
 * Creates an initialization error message
 */
export const initializationError = (
  component: string,
  reason?: string,
): string => {
  return `Failed to initialize ${component}${reason ? `: ${reason}` : ""}`;
};
