import { serve } from "@hono/node-server";
import { existsSync, statSync } from "fs";
import { Server as HttpServer } from "http";
import type { Server as NetServer } from "net";
import { resolve } from "path";
import {
  getErrorCode,
  getErrorMessage,
  initializationError,
  notFoundError,
  type Logger,
} from "@file-serve/utils";
import {
  fileServerConfigSchema,
  type FileServerConfig,
  type FileServerConfigInput,
} from "./config";
import { ServerStartupError } from "./errors";
import { createFileServerApp } from "./file-server-app";

export interface ServerManagerOptions {
  logger: Logger;
  config?: FileServerConfigInput;
  /** Called when the listening socket fails after startup */
  onError?: (error: Error) => void;
}

export interface ServerAddress {
  hostname: string;
  port: number;
  url: string;
}

const COMPONENT = "file server";

/**
 * Owns the listening socket: binds it, serves the root directory through
 * the file server app, and releases it on stop.
 */
export class ServerManager {
  private logger: Logger;
  private config: FileServerConfig;
  private rootDir: string;
  private onError: ((error: Error) => void) | undefined;
  private server: NetServer | null = null;
  private address: ServerAddress | null = null;

  constructor(options: ServerManagerOptions) {
    this.logger = options.logger;
    this.config = fileServerConfigSchema.parse(options.config ?? {});
    // Resolve relative to process.cwd()
    this.rootDir = resolve(process.cwd(), this.config.rootDir ?? ".");
    this.onError = options.onError;
  }

  public getConfig(): FileServerConfig {
    return this.config;
  }

  /**
   * Bind the socket and start serving. Aborting the signal stops the server.
   */
  async start(signal?: AbortSignal): Promise<ServerAddress> {
    if (this.server && this.address) {
      this.logger.warn("File server already running");
      return this.address;
    }

    const { hostname, port } = this.config;

    if (signal?.aborted) {
      throw new ServerStartupError(
        initializationError(COMPONENT, "start was aborted"),
        { hostname, port },
      );
    }

    if (!existsSync(this.rootDir) || !statSync(this.rootDir).isDirectory()) {
      throw new ServerStartupError(
        initializationError(
          COMPONENT,
          notFoundError(this.rootDir, "Root directory"),
        ),
        { hostname, port, rootDir: this.rootDir },
      );
    }

    this.logger.info(
      `Starting file server for ${this.rootDir} on ${hostname}:${port}`,
    );

    const app = createFileServerApp({
      rootDir: this.rootDir,
      directoryListing: this.config.directoryListing,
      logger: this.logger,
    });

    const server = await new Promise<NetServer>((resolveServer, reject) => {
      const instance: NetServer = serve(
        { fetch: app.fetch, port, hostname },
        () => {
          instance.off("error", onBindError);
          resolveServer(instance);
        },
      );
      const onBindError = (error: Error): void => {
        reject(this.toStartupError(error, hostname, port));
      };
      instance.once("error", onBindError);
    });

    server.on("error", (error: Error) => {
      this.logger.error("File server socket error", error);
      this.onError?.(error);
    });

    const boundPort = this.readBoundPort(server) ?? port;
    const displayHost = hostname === "0.0.0.0" ? "localhost" : hostname;
    this.server = server;
    this.address = {
      hostname,
      port: boundPort,
      url: `http://${displayHost}:${boundPort}`,
    };

    signal?.addEventListener(
      "abort",
      () => {
        this.stop().catch((error: unknown) => {
          this.logger.error(
            `Failed to stop file server: ${getErrorMessage(error)}`,
          );
        });
      },
      { once: true },
    );

    this.logger.info(`File server started at ${this.address.url}`);
    return this.address;
  }

  /**
   * Close the listening socket so the port can be bound again. Open
   * connections are cut, in-flight responses are not drained.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger.warn("File server not running");
      return;
    }

    this.server = null;
    this.address = null;

    await new Promise<void>((resolveClose, reject) => {
      server.close((error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolveClose();
        }
      });
      if (server instanceof HttpServer) {
        server.closeAllConnections();
      }
    });

    this.logger.info("File server stopped");
  }

  /**
   * Get server status
   */
  getStatus(): {
    running: boolean;
    url: string | undefined;
    rootDir: string;
  } {
    return {
      running: this.server !== null,
      url: this.address?.url,
      rootDir: this.rootDir,
    };
  }

  private readBoundPort(server: NetServer): number | undefined {
    const info = server.address();
    return info !== null && typeof info === "object" ? info.port : undefined;
  }

  private toStartupError(
    error: Error,
    hostname: string,
    port: number,
  ): ServerStartupError {
    const code = getErrorCode(error);
    const address = `${hostname}:${port}`;
    let reason: string;
    switch (code) {
      case "EADDRINUSE":
        reason = `address ${address} is already in use`;
        break;
      case "EACCES":
        reason = `permission denied binding ${address}`;
        break;
      case "EADDRNOTAVAIL":
        reason = `address ${address} is not available`;
        break;
      default:
        reason = getErrorMessage(error);
    }

    return new ServerStartupError(initializationError(COMPONENT, reason), {
      hostname,
      port,
      code,
    });
  }
}
