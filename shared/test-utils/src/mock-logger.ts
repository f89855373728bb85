import { vi } from "vitest";
import type { Logger } from "@file-serve/utils";

export { createSilentLogger, createTestLogger } from "@file-serve/utils";

/**
 * Create a mock Logger for testing with spyable methods
 *
 * Returns a Logger-typed object where all methods are Vitest mock functions.
 * The cast is centralized here so test files don't need `as unknown as` casts.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const manager = new ServerManager({ logger });
 * await manager.stop();
 *
 * expect(logger.warn).toHaveBeenCalledWith("File server not running");
 * ```
 */
export function createMockLogger(): Logger {
  const mockLogger = {
    silly: vi.fn(),
    verbose: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => mockLogger),
    setUseStderr: vi.fn(),
    setLevel: vi.fn(),
  };

  return mockLogger as unknown as Logger;
}
