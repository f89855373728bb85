/**
 * @file-serve/test-utils
 *
 * Shared test helpers. Mock factories return properly typed objects with the
 * `as unknown as` cast kept inside the factory.
 */

// Logger utilities
export {
  createSilentLogger,
  createTestLogger,
  createMockLogger,
} from "./mock-logger";

// Filesystem fixtures
export { createTempSite, type SiteFiles, type TempSite } from "./temp-site";
