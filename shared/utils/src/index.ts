/**
 * file-serve utils package
 *
 * Shared utilities: logging, error messages and the central zod export.
 */

// Logger
export { Logger, LogLevel, parseLogLevel, type LoggerOptions } from "./logger";

// Test utilities
export { createSilentLogger, createTestLogger } from "./test-utils";

// Error message utilities
export {
  getErrorMessage,
  getErrorCode,
  notFoundError,
  initializationError,
} from "./errors";

// Zod
export { z, ZodError } from "./zod";
