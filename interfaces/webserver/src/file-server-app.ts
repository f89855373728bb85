import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";
import { etag } from "hono/etag";
import { logger as requestLogger } from "hono/logger";
import type { Stats } from "fs";
import { stat } from "fs/promises";
import { getErrorCode, type Logger } from "@file-serve/utils";
import { resolveRequestPath, type RequestTarget } from "./request-path";
import {
  readDirectoryEntries,
  renderDirectoryListing,
} from "./directory-listing";

export interface FileServerAppOptions {
  /** Absolute path of the directory to serve */
  rootDir: string;
  directoryListing: boolean;
  logger: Logger;
}

export type FileServerEnv = {
  Variables: {
    target: RequestTarget;
  };
};

const ALLOWED_METHODS = ["GET", "HEAD"];

/**
 * stat() that treats a missing path as absent rather than as a failure
 */
async function statIfExists(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    const code = getErrorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return null;
    }
    throw error;
  }
}

/**
 * Build the request pipeline serving files below rootDir
 */
export function createFileServerApp(
  options: FileServerAppOptions,
): Hono<FileServerEnv> {
  const { rootDir, directoryListing, logger } = options;
  const app = new Hono<FileServerEnv>();

  app.use(
    "*",
    requestLogger((message, ...rest) => logger.info(message, ...rest)),
  );

  app.use("*", async (c, next) => {
    if (!ALLOWED_METHODS.includes(c.req.method)) {
      c.header("Allow", ALLOWED_METHODS.join(", "));
      return c.text(`Unsupported method ('${c.req.method}')`, 501);
    }
    await next();
  });

  app.use("*", etag());

  // Resolve the request onto the filesystem before anything touches it
  app.use("*", async (c, next) => {
    const url = new URL(c.req.url);
    const resolved = resolveRequestPath(rootDir, url.pathname);

    if (resolved.status === "malformed") {
      logger.debug(
        `Rejected request path ${url.pathname}: ${resolved.reason}`,
      );
      return c.text("Bad request", 400);
    }
    if (resolved.status === "outside-root") {
      logger.warn(`Rejected path outside served root: ${url.pathname}`);
      return c.notFound();
    }

    const stats = await statIfExists(resolved.target.filePath);
    if (stats?.isDirectory() && !url.pathname.endsWith("/")) {
      return c.redirect(`${url.pathname}/${url.search}`, 301);
    }

    // Whole files only, ranges are not supported
    c.req.raw.headers.delete("range");

    c.set("target", resolved.target);
    await next();
  });

  // Serve the already resolved file; serveStatic must not re-derive it from
  // the URL, which it decodes differently
  app.use("*", (c, next) =>
    serveStatic<FileServerEnv>({ path: c.get("target").filePath })(c, next),
  );

  // Reached only when serveStatic found no file (or no index.html)
  app.get("*", async (c) => {
    if (!directoryListing) {
      return c.notFound();
    }

    const target = c.get("target");
    const stats = await statIfExists(target.filePath);
    if (!stats?.isDirectory()) {
      return c.notFound();
    }

    const entries = await readDirectoryEntries(target.filePath);
    return c.html(renderDirectoryListing(target.urlPath, entries));
  });

  app.notFound((c) => c.text("File not found", 404));

  app.onError((error, c) => {
    logger.error(`Error serving ${c.req.path}`, error);
    return c.text("Internal Server Error", 500);
  });

  return app;
}
