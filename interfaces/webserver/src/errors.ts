/**
 * File server error classes
 */

/**
 * Raised when the server cannot get from Starting to Serving
 */
export class ServerStartupError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ServerStartupError";
  }
}
